// Query params cho GET /movie-sessions?date=YYYY-MM-DD&movie=<id>
import { IsISO8601, IsMongoId, IsOptional, Matches } from 'class-validator';
import { MovieSessionFilters } from '../movie-session-filter';

export class MovieSessionFilterDto implements MovieSessionFilters {
  // Ngày chiếu (UTC), phải là ngày có thật
  @IsOptional()
  @Matches(/^\d{4}-\d{2}-\d{2}$/, {
    message: 'date must be in YYYY-MM-DD format',
  })
  @IsISO8601({ strict: true })
  date?: string;

  @IsOptional()
  @IsMongoId()
  movie?: string;
}
