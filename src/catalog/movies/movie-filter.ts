// Dựng filter MongoDB cho danh sách phim
// - title: chứa chuỗi con, KHÔNG phân biệt hoa thường
// - genres / actors: phim có ít nhất một trong các id được truyền
// Các điều kiện kết hợp bằng AND; không có điều kiện nào → {} (lấy tất cả)
import type { FilterQuery } from 'mongoose';
import type { Movie } from './schemas/movie.schema';

export interface MovieFilters {
  title?: string;
  genres?: string[];
  actors?: string[];
}

// Escape ký tự đặc biệt để title được so khớp như chuỗi thường, không phải regex
export const escapeRegExp = (value: string) =>
  value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');

export function buildMovieFilter(filters: MovieFilters): FilterQuery<Movie> {
  const query: FilterQuery<Movie> = {};

  const title = filters.title?.trim();
  if (title) {
    query.title = { $regex: escapeRegExp(title), $options: 'i' };
  }

  if (filters.genres && filters.genres.length > 0) {
    query.genres = { $in: filters.genres };
  }

  if (filters.actors && filters.actors.length > 0) {
    query.actors = { $in: filters.actors };
  }

  return query;
}
