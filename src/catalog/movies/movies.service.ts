// MoviesService - catalog phim: lọc danh sách, chi tiết, tạo mới, gắn/gỡ poster
import {
  BadRequestException,
  Injectable,
  Logger,
  NotFoundException,
} from '@nestjs/common';
import { InjectModel } from '@nestjs/mongoose';
import { Model } from 'mongoose';
import { Movie, MovieDocument } from './schemas/movie.schema';
import { Genre, GenreDocument } from '../genres/schemas/genre.schema';
import { Actor, ActorDocument } from '../actors/schemas/actor.schema';
import { MediaStorageService } from '../../media/media-storage.service';
import { CreateMovieDto } from './dto/create-movie.dto';
import { buildMovieFilter, MovieFilters } from './movie-filter';
import {
  MovieDetailResponse,
  MovieImageResponse,
  MovieListItemResponse,
  MovieRefs,
  MovieResponse,
  presentMovie,
  presentMovieDetail,
  presentMovieImage,
  presentMovieListItem,
} from './movie.presenter';

// Thư mục con trong MEDIA_ROOT chứa poster phim
export const MOVIE_IMAGE_DIR = 'uploads/movies';

const unique = (ids: string[]) => [...new Set(ids)];

@Injectable()
export class MoviesService {
  private readonly logger = new Logger(MoviesService.name);

  constructor(
    @InjectModel(Movie.name) private readonly movieModel: Model<MovieDocument>,
    @InjectModel(Genre.name) private readonly genreModel: Model<GenreDocument>,
    @InjectModel(Actor.name) private readonly actorModel: Model<ActorDocument>,
    private readonly mediaStorage: MediaStorageService,
  ) {}

  /**
   * Tạo phim mới
   * @param inlineImage - file "image" gửi kèm trong cùng request (nếu có) sẽ KHÔNG được lưu
   */
  async create(
    dto: CreateMovieDto,
    inlineImage?: Express.Multer.File,
  ): Promise<MovieResponse> {
    const genres = unique(dto.genres);
    const actors = unique(dto.actors);

    // Kiểm tra mọi genre/actor được tham chiếu đều tồn tại
    const [genreCount, actorCount] = await Promise.all([
      this.genreModel.countDocuments({ _id: { $in: genres } }).exec(),
      this.actorModel.countDocuments({ _id: { $in: actors } }).exec(),
    ]);
    if (genreCount !== genres.length) {
      throw new BadRequestException('One or more genres do not exist');
    }
    if (actorCount !== actors.length) {
      throw new BadRequestException('One or more actors do not exist');
    }

    const movie = await this.movieModel.create({
      title: dto.title,
      description: dto.description,
      duration: dto.duration,
      genres,
      actors,
    });

    if (inlineImage) {
      this.logger.log(
        `Ignored inline image "${inlineImage.originalname}" for new movie ${movie._id.toString()}; use the upload-image endpoint`,
      );
    }
    this.logger.log(`Created movie ${movie._id.toString()} "${movie.title}"`);
    return presentMovie(movie);
  }

  // Danh sách phim (có filter), thứ tự theo thời điểm tạo
  async findAll(filters: MovieFilters = {}): Promise<MovieListItemResponse[]> {
    const movies = await this.movieModel
      .find(buildMovieFilter(filters))
      .sort({ _id: 1 })
      .populate<MovieRefs>(['genres', 'actors'])
      .lean()
      .exec();

    return movies.map((movie) =>
      presentMovieListItem(movie, this.mediaStorage.urlFor(movie.image)),
    );
  }

  // Chi tiết phim kèm genres/actors đầy đủ
  async findOne(id: string): Promise<MovieDetailResponse> {
    const movie = await this.movieModel
      .findById(id)
      .populate<MovieRefs>(['genres', 'actors'])
      .lean()
      .exec();
    if (!movie) throw new NotFoundException('Movie not found');

    return presentMovieDetail(movie, this.mediaStorage.urlFor(movie.image));
  }

  /**
   * Gắn poster cho phim
   * - 404 nếu phim không tồn tại, 400 nếu không có file hoặc file không phải ảnh
   * - Ảnh cũ (nếu có) bị xoá khỏi disk ngay sau khi cập nhật phim
   */
  async uploadImage(
    id: string,
    file?: Express.Multer.File,
  ): Promise<MovieImageResponse> {
    const movie = await this.movieModel.findById(id).lean().exec();
    if (!movie) throw new NotFoundException('Movie not found');

    if (!file || file.size === 0) {
      throw new BadRequestException('No image file was submitted');
    }

    // saveImage validate ảnh trước khi ghi → file lỗi không để lại gì trên disk
    const stored = await this.mediaStorage.saveImage(
      file.buffer,
      MOVIE_IMAGE_DIR,
      movie.title,
    );

    // Ảnh cũ lấy từ chính lần update (new: false), không từ lần đọc ở trên:
    // hai upload chồng nhau thì mỗi bên xoá đúng file mà mình thay thế
    const before = await this.movieModel
      .findByIdAndUpdate(id, { image: stored.path }, { new: false })
      .lean()
      .exec();
    if (!before) {
      // Phim bị xoá giữa chừng → dọn file vừa ghi
      await this.mediaStorage.delete(stored.path);
      throw new NotFoundException('Movie not found');
    }

    const previous = before.image;
    if (previous && previous !== stored.path) {
      await this.mediaStorage.delete(previous);
      this.logger.log(
        `Replaced image of movie ${id} (${previous} → ${stored.path})`,
      );
    } else {
      this.logger.log(`Attached image ${stored.path} to movie ${id}`);
    }

    return presentMovieImage(before, this.mediaStorage.urlFor(stored.path));
  }

  // Gỡ poster khỏi phim và xoá file trên disk
  async removeImage(id: string): Promise<MovieImageResponse> {
    const before = await this.movieModel
      .findByIdAndUpdate(id, { image: null }, { new: false })
      .lean()
      .exec();
    if (!before) throw new NotFoundException('Movie not found');

    if (before.image) {
      await this.mediaStorage.delete(before.image);
      this.logger.log(`Removed image of movie ${id}`);
    }
    return presentMovieImage(before, null);
  }
}
