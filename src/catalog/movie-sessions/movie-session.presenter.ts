// Định dạng response cho suất chiếu
import { Types } from 'mongoose';
import {
  CinemaHallRecord,
  CinemaHallResponse,
  hallCapacity,
  presentCinemaHall,
} from '../cinema-halls/cinema-hall.presenter';
import {
  MovieListItemResponse,
  MovieRecord,
  PopulatedMovie,
  presentMovieListItem,
} from '../movies/movie.presenter';

export interface MovieSessionRecord {
  _id: Types.ObjectId;
  showTime: Date;
}

// Suất chiếu với movie/cinemaHall đã populate
export type PopulatedMovieSession<TMovie extends MovieRecord = MovieRecord> =
  MovieSessionRecord & {
    movie: TMovie;
    cinemaHall: CinemaHallRecord;
  };

// Response của create/update
export interface MovieSessionResponse {
  id: string;
  show_time: string;
  movie: string;
  cinema_hall: string;
}

// Một phần tử của GET /movie-sessions
export interface MovieSessionListItemResponse {
  id: string;
  show_time: string;
  movie_title: string;
  movie_image: string | null;
  cinema_hall_name: string;
  cinema_hall_capacity: number;
}

// GET /movie-sessions/:id
export interface MovieSessionDetailResponse {
  id: string;
  show_time: string;
  movie: MovieListItemResponse;
  cinema_hall: CinemaHallResponse;
}

export const presentMovieSession = (
  session: MovieSessionRecord & {
    movie: Types.ObjectId;
    cinemaHall: Types.ObjectId;
  },
): MovieSessionResponse => ({
  id: session._id.toString(),
  show_time: session.showTime.toISOString(),
  movie: session.movie.toString(),
  cinema_hall: session.cinemaHall.toString(),
});

// movie_image lấy từ poster hiện tại của phim lúc đọc (không lưu trùng)
export const presentMovieSessionListItem = (
  session: PopulatedMovieSession,
  movieImageUrl: string | null,
): MovieSessionListItemResponse => ({
  id: session._id.toString(),
  show_time: session.showTime.toISOString(),
  movie_title: session.movie.title,
  movie_image: movieImageUrl,
  cinema_hall_name: session.cinemaHall.name,
  cinema_hall_capacity: hallCapacity(session.cinemaHall),
});

export const presentMovieSessionDetail = (
  session: PopulatedMovieSession<PopulatedMovie>,
  movieImageUrl: string | null,
): MovieSessionDetailResponse => ({
  id: session._id.toString(),
  show_time: session.showTime.toISOString(),
  movie: presentMovieListItem(session.movie, movieImageUrl),
  cinema_hall: presentCinemaHall(session.cinemaHall),
});
