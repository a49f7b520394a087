// DTO tạo mới suất chiếu
import { IsDateString, IsMongoId, IsNotEmpty } from 'class-validator';

export class CreateMovieSessionDto {
  // Thời gian bắt đầu (ISO string)
  @IsNotEmpty()
  @IsDateString()
  show_time!: string;

  // Phim chiếu
  @IsNotEmpty()
  @IsMongoId()
  movie!: string;

  // Phòng chiếu
  @IsNotEmpty()
  @IsMongoId()
  cinema_hall!: string;
}
