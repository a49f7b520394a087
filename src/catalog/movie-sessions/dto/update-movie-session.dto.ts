// DTO cập nhật suất chiếu - tất cả field tuỳ chọn
import { IsDateString, IsMongoId, IsOptional } from 'class-validator';

export class UpdateMovieSessionDto {
  @IsOptional()
  @IsDateString()
  show_time?: string;

  @IsOptional()
  @IsMongoId()
  movie?: string;

  @IsOptional()
  @IsMongoId()
  cinema_hall?: string;
}
