// Định dạng response cho phim (snake_case, id dạng string, image = URL public hoặc null)
import { Types } from 'mongoose';
import {
  GenreRecord,
  GenreResponse,
  presentGenre,
} from '../genres/genre.presenter';
import {
  ActorRecord,
  ActorResponse,
  actorFullName,
  presentActor,
} from '../actors/actor.presenter';

export interface MovieRecord {
  _id: Types.ObjectId;
  title: string;
  description: string;
  duration: number;
  image?: string | null;
}

// Phim khi genres/actors mới chỉ là id (vừa tạo)
export interface MovieWithIds extends MovieRecord {
  genres: Types.ObjectId[];
  actors: Types.ObjectId[];
}

// Các path được populate khi đọc phim
export interface MovieRefs {
  genres: GenreRecord[];
  actors: ActorRecord[];
}

export type PopulatedMovie = MovieRecord & MovieRefs;

interface MovieBaseResponse {
  id: string;
  title: string;
  description: string;
  duration: number;
}

// Response của POST /movies - không có image
export interface MovieResponse extends MovieBaseResponse {
  genres: string[];
  actors: string[];
}

// Một phần tử của GET /movies
export interface MovieListItemResponse extends MovieBaseResponse {
  genres: string[];
  actors: string[];
  image: string | null;
}

// GET /movies/:id
export interface MovieDetailResponse extends MovieBaseResponse {
  genres: GenreResponse[];
  actors: ActorResponse[];
  image: string | null;
}

export interface MovieImageResponse {
  id: string;
  image: string | null;
}

const presentBase = (movie: MovieRecord): MovieBaseResponse => ({
  id: movie._id.toString(),
  title: movie.title,
  description: movie.description,
  duration: movie.duration,
});

export const presentMovie = (movie: MovieWithIds): MovieResponse => ({
  ...presentBase(movie),
  genres: movie.genres.map((id) => id.toString()),
  actors: movie.actors.map((id) => id.toString()),
});

export const presentMovieListItem = (
  movie: PopulatedMovie,
  imageUrl: string | null,
): MovieListItemResponse => ({
  ...presentBase(movie),
  genres: movie.genres.map((genre) => genre.name),
  actors: movie.actors.map(actorFullName),
  image: imageUrl,
});

export const presentMovieDetail = (
  movie: PopulatedMovie,
  imageUrl: string | null,
): MovieDetailResponse => ({
  ...presentBase(movie),
  genres: movie.genres.map(presentGenre),
  actors: movie.actors.map(presentActor),
  image: imageUrl,
});

export const presentMovieImage = (
  movie: MovieRecord,
  imageUrl: string | null,
): MovieImageResponse => ({
  id: movie._id.toString(),
  image: imageUrl,
});
