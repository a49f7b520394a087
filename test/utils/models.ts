// Bộ InMemoryModel cho toàn bộ collection, đã nối các quan hệ ref như schema thật
import { getModelToken } from '@nestjs/mongoose';
import type { Provider } from '@nestjs/common';
import { InMemoryModel } from './in-memory-model';
import { User } from '../../src/users/schemas/user.schema';
import { Genre } from '../../src/catalog/genres/schemas/genre.schema';
import { Actor } from '../../src/catalog/actors/schemas/actor.schema';
import { CinemaHall } from '../../src/catalog/cinema-halls/schemas/cinema-hall.schema';
import { Movie } from '../../src/catalog/movies/schemas/movie.schema';
import { MovieSession } from '../../src/catalog/movie-sessions/schemas/movie-session.schema';

export interface CatalogModels {
  users: InMemoryModel;
  genres: InMemoryModel;
  actors: InMemoryModel;
  cinemaHalls: InMemoryModel;
  movies: InMemoryModel;
  movieSessions: InMemoryModel;
}

export function createModels(): CatalogModels {
  const users = new InMemoryModel(User.name, {
    hidden: ['password'],
    defaults: () => ({ roles: ['user'], isActive: true }),
  });
  const genres = new InMemoryModel(Genre.name);
  const actors = new InMemoryModel(Actor.name);
  const cinemaHalls = new InMemoryModel(CinemaHall.name);
  const movies = new InMemoryModel(Movie.name, {
    defaults: () => ({ genres: [], actors: [], image: null }),
  }).link({ genres, actors });
  const movieSessions = new InMemoryModel(MovieSession.name).link({
    movie: movies,
    cinemaHall: cinemaHalls,
  });
  return { users, genres, actors, cinemaHalls, movies, movieSessions };
}

// Provider thay cho MongooseModule.forFeature (@InjectModel(X.name) → InMemoryModel)
export const modelProviders = (models: CatalogModels): Provider[] => [
  { provide: getModelToken(User.name), useValue: models.users },
  { provide: getModelToken(Genre.name), useValue: models.genres },
  { provide: getModelToken(Actor.name), useValue: models.actors },
  { provide: getModelToken(CinemaHall.name), useValue: models.cinemaHalls },
  { provide: getModelToken(Movie.name), useValue: models.movies },
  { provide: getModelToken(MovieSession.name), useValue: models.movieSessions },
];
