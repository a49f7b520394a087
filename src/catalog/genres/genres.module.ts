// GenresModule - gom controller/service cho thể loại phim
import { Module } from '@nestjs/common';
import { MongooseModule } from '@nestjs/mongoose';
import { GenresService } from './genres.service';
import { GenresController } from './genres.controller';
import { Genre, GenreSchema } from './schemas/genre.schema';

@Module({
  imports: [
    MongooseModule.forFeature([{ name: Genre.name, schema: GenreSchema }]),
  ],
  controllers: [GenresController],
  providers: [GenresService],
  // Export MongooseModule để MoviesModule dùng lại Genre model (kiểm tra id khi tạo phim)
  exports: [GenresService, MongooseModule],
})
export class GenresModule {}
