// MovieSessionsModule - gom controller/service cho suất chiếu
import { Module } from '@nestjs/common';
import { MongooseModule } from '@nestjs/mongoose';
import { MovieSessionsService } from './movie-sessions.service';
import { MovieSessionsController } from './movie-sessions.controller';
import {
  MovieSession,
  MovieSessionSchema,
} from './schemas/movie-session.schema';
import { MoviesModule } from '../movies/movies.module';
import { CinemaHallsModule } from '../cinema-halls/cinema-halls.module';
import { MediaModule } from '../../media/media.module';

@Module({
  imports: [
    MongooseModule.forFeature([
      { name: MovieSession.name, schema: MovieSessionSchema },
    ]),
    // Movie/CinemaHall model (export qua MongooseModule) để kiểm tra tham chiếu và populate
    MoviesModule,
    CinemaHallsModule,
    // urlFor() cho movie_image
    MediaModule,
  ],
  controllers: [MovieSessionsController],
  providers: [MovieSessionsService],
})
export class MovieSessionsModule {}
