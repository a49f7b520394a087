// GenresService - danh sách và tạo thể loại phim
import { BadRequestException, Injectable, Logger } from '@nestjs/common';
import { InjectModel } from '@nestjs/mongoose';
import { Model } from 'mongoose';
import { Genre, GenreDocument } from './schemas/genre.schema';
import { CreateGenreDto } from './dto/create-genre.dto';
import { GenreResponse, presentGenre } from './genre.presenter';

@Injectable()
export class GenresService {
  private readonly logger = new Logger(GenresService.name);

  constructor(
    @InjectModel(Genre.name) private readonly genreModel: Model<GenreDocument>,
  ) {}

  // Tạo thể loại mới, tên trùng → 400
  async create(dto: CreateGenreDto): Promise<GenreResponse> {
    const name = dto.name.trim();
    const duplicate = await this.genreModel.exists({ name }).exec();
    if (duplicate) {
      throw new BadRequestException('Genre with this name already exists');
    }

    const genre = await this.genreModel.create({ name });
    this.logger.log(`Created genre "${name}"`);
    return presentGenre(genre);
  }

  // Danh sách thể loại theo thứ tự tạo
  async findAll(): Promise<GenreResponse[]> {
    const genres = await this.genreModel.find().sort({ _id: 1 }).lean().exec();
    return genres.map(presentGenre);
  }
}
