// MoviesModule - gom controller/service cho phim
import { Module } from '@nestjs/common';
import { MongooseModule } from '@nestjs/mongoose';
import { MoviesService } from './movies.service';
import { MoviesController } from './movies.controller';
import { Movie, MovieSchema } from './schemas/movie.schema';
import { GenresModule } from '../genres/genres.module';
import { ActorsModule } from '../actors/actors.module';
import { MediaModule } from '../../media/media.module';

@Module({
  imports: [
    // Đăng ký schema Movie để dùng trong module này
    MongooseModule.forFeature([{ name: Movie.name, schema: MovieSchema }]),
    // Genre/Actor model để kiểm tra id khi tạo phim
    GenresModule,
    ActorsModule,
    // Lưu/xoá file poster
    MediaModule,
  ],
  controllers: [MoviesController],
  providers: [MoviesService],
  exports: [MoviesService, MongooseModule],
})
export class MoviesModule {}
