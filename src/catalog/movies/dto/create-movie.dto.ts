// DTO tạo mới Movie
// Nhận được cả JSON lẫn multipart/form-data (field "image" nếu có sẽ bị bỏ qua,
// poster chỉ được gắn qua POST /movies/:id/upload-image)
import { Transform } from 'class-transformer';
import {
  IsArray,
  IsInt,
  IsMongoId,
  IsNotEmpty,
  IsString,
  MaxLength,
  Min,
} from 'class-validator';
import { trimString } from '../../../common/transforms/trim.transform';
import { toIdList } from '../../../common/transforms/to-id-list.transform';

export class CreateMovieDto {
  @Transform(trimString)
  @IsNotEmpty()
  @IsString()
  @MaxLength(255)
  title!: string;

  @Transform(trimString)
  @IsNotEmpty()
  @IsString()
  description!: string;

  // Thời lượng (phút), multipart gửi "90" → enableImplicitConversion đổi thành 90
  @IsInt()
  @Min(1)
  duration!: number;

  // Danh sách id thể loại
  @Transform(toIdList)
  @IsArray()
  @IsMongoId({ each: true })
  genres: string[] = [];

  // Danh sách id diễn viên
  @Transform(toIdList)
  @IsArray()
  @IsMongoId({ each: true })
  actors: string[] = [];
}
