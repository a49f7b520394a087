// DTO tạo mới Genre
import { Transform } from 'class-transformer';
import { IsNotEmpty, IsString, MaxLength } from 'class-validator';
import { trimString } from '../../../common/transforms/trim.transform';

export class CreateGenreDto {
  @Transform(trimString)
  @IsNotEmpty()
  @IsString()
  @MaxLength(255)
  name!: string;
}
