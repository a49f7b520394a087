// DTO tạo mới CinemaHall (phòng chiếu)
import { Transform } from 'class-transformer';
import {
  IsInt,
  IsNotEmpty,
  IsString,
  MaxLength,
  Max,
  Min,
} from 'class-validator';
import { trimString } from '../../../common/transforms/trim.transform';

export class CreateCinemaHallDto {
  // Tên phòng chiếu
  @Transform(trimString)
  @IsNotEmpty()
  @IsString()
  @MaxLength(255)
  name!: string;

  // Số hàng ghế (1..100)
  @IsInt()
  @Min(1)
  @Max(100)
  rows!: number;

  // Số ghế mỗi hàng (1..100)
  @IsInt()
  @Min(1)
  @Max(100)
  seats_in_row!: number;
}
