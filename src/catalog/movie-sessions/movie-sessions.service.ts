// MovieSessionsService - CRUD suất chiếu
import {
  BadRequestException,
  Injectable,
  Logger,
  NotFoundException,
} from '@nestjs/common';
import { InjectModel } from '@nestjs/mongoose';
import { Model, Types } from 'mongoose';
import {
  MovieSession,
  MovieSessionDocument,
} from './schemas/movie-session.schema';
import { Movie, MovieDocument } from '../movies/schemas/movie.schema';
import {
  CinemaHall,
  CinemaHallDocument,
} from '../cinema-halls/schemas/cinema-hall.schema';
import { MediaStorageService } from '../../media/media-storage.service';
import { CreateMovieSessionDto } from './dto/create-movie-session.dto';
import { UpdateMovieSessionDto } from './dto/update-movie-session.dto';
import {
  buildMovieSessionFilter,
  MovieSessionFilters,
} from './movie-session-filter';
import {
  MovieSessionDetailResponse,
  MovieSessionListItemResponse,
  MovieSessionResponse,
  presentMovieSession,
  presentMovieSessionDetail,
  presentMovieSessionListItem,
} from './movie-session.presenter';
import { MovieRecord, PopulatedMovie } from '../movies/movie.presenter';
import { CinemaHallRecord } from '../cinema-halls/cinema-hall.presenter';

@Injectable()
export class MovieSessionsService {
  private readonly logger = new Logger(MovieSessionsService.name);

  constructor(
    @InjectModel(MovieSession.name)
    private readonly movieSessionModel: Model<MovieSessionDocument>,
    @InjectModel(Movie.name) private readonly movieModel: Model<MovieDocument>,
    @InjectModel(CinemaHall.name)
    private readonly cinemaHallModel: Model<CinemaHallDocument>,
    private readonly mediaStorage: MediaStorageService,
  ) {}

  // Tạo suất chiếu mới
  async create(dto: CreateMovieSessionDto): Promise<MovieSessionResponse> {
    await this.assertReferencesExist(dto.movie, dto.cinema_hall);

    const session = await this.movieSessionModel.create({
      showTime: new Date(dto.show_time),
      movie: dto.movie,
      cinemaHall: dto.cinema_hall,
    });
    this.logger.log(
      `Created session ${session._id.toString()} for movie ${dto.movie}`,
    );
    return presentMovieSession(session);
  }

  // Danh sách suất chiếu, lọc theo ?date=&movie=, sắp xếp theo giờ chiếu
  async findAll(
    filters: MovieSessionFilters = {},
  ): Promise<MovieSessionListItemResponse[]> {
    const sessions = await this.movieSessionModel
      .find(buildMovieSessionFilter(filters))
      .sort({ showTime: 1, _id: 1 })
      .populate<{ movie: MovieRecord; cinemaHall: CinemaHallRecord }>([
        'movie',
        'cinemaHall',
      ])
      .lean()
      .exec();

    return sessions.map((session) =>
      presentMovieSessionListItem(
        session,
        this.mediaStorage.urlFor(session.movie.image),
      ),
    );
  }

  // Chi tiết suất chiếu kèm phim (genres/actors) và phòng chiếu
  async findOne(id: string): Promise<MovieSessionDetailResponse> {
    const session = await this.movieSessionModel
      .findById(id)
      .populate<{ movie: PopulatedMovie; cinemaHall: CinemaHallRecord }>([
        { path: 'movie', populate: [{ path: 'genres' }, { path: 'actors' }] },
        { path: 'cinemaHall' },
      ])
      .lean()
      .exec();
    if (!session) throw new NotFoundException('Movie session not found');

    return presentMovieSessionDetail(
      session,
      this.mediaStorage.urlFor(session.movie.image),
    );
  }

  // Cập nhật suất chiếu
  async update(
    id: string,
    dto: UpdateMovieSessionDto,
  ): Promise<MovieSessionResponse> {
    await this.assertReferencesExist(dto.movie, dto.cinema_hall);

    const payload: Partial<{
      showTime: Date;
      movie: string;
      cinemaHall: string;
    }> = {};
    if (dto.show_time !== undefined) payload.showTime = new Date(dto.show_time);
    if (dto.movie !== undefined) payload.movie = dto.movie;
    if (dto.cinema_hall !== undefined) payload.cinemaHall = dto.cinema_hall;

    const updated = await this.movieSessionModel
      .findByIdAndUpdate(id, payload, { new: true })
      .lean()
      .exec();
    if (!updated) throw new NotFoundException('Movie session not found');
    return presentMovieSession(updated);
  }

  // Xoá suất chiếu
  async remove(id: string): Promise<void> {
    const res = await this.movieSessionModel.findByIdAndDelete(id).exec();
    if (!res) throw new NotFoundException('Movie session not found');
    this.logger.log(`Deleted session ${id}`);
  }

  // Suất chiếu luôn phải trỏ tới phim và phòng chiếu có thật
  private async assertReferencesExist(movieId?: string, hallId?: string) {
    const [movie, hall] = await Promise.all([
      movieId ? this.movieModel.exists({ _id: movieId }).exec() : true,
      hallId ? this.cinemaHallModel.exists({ _id: hallId }).exec() : true,
    ]);
    if (!movie) {
      throw new BadRequestException(`Movie with ID ${movieId} does not exist`);
    }
    if (!hall) {
      throw new BadRequestException(
        `Cinema hall with ID ${hallId} does not exist`,
      );
    }
  }
}
