// Dựng filter MongoDB cho danh sách suất chiếu
import type { FilterQuery } from 'mongoose';
import type { MovieSession } from './schemas/movie-session.schema';

const DAY_MS = 24 * 60 * 60 * 1000;

export interface MovieSessionFilters {
  date?: string; // YYYY-MM-DD
  movie?: string;
}

export function buildMovieSessionFilter(
  filters: MovieSessionFilters,
): FilterQuery<MovieSession> {
  const query: FilterQuery<MovieSession> = {};

  // Suất chiếu trong ngày (UTC): [00:00, 00:00 ngày hôm sau)
  if (filters.date) {
    const start = new Date(`${filters.date}T00:00:00.000Z`);
    query.showTime = { $gte: start, $lt: new Date(start.getTime() + DAY_MS) };
  }

  if (filters.movie) {
    query.movie = filters.movie;
  }

  return query;
}
