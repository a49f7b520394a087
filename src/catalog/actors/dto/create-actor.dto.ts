// DTO tạo mới Actor - field theo snake_case giống response
import { Transform } from 'class-transformer';
import { IsNotEmpty, IsString, MaxLength } from 'class-validator';
import { trimString } from '../../../common/transforms/trim.transform';

export class CreateActorDto {
  @Transform(trimString)
  @IsNotEmpty()
  @IsString()
  @MaxLength(255)
  first_name!: string;

  @Transform(trimString)
  @IsNotEmpty()
  @IsString()
  @MaxLength(255)
  last_name!: string;
}
