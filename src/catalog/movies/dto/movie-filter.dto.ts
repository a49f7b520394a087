// Query params cho GET /movies?title=...&genres=...&actors=...
// genres/actors nhận 1 id hoặc nhiều id cách nhau bởi dấu phẩy; id sai định dạng → 400
import { Transform } from 'class-transformer';
import { IsArray, IsMongoId, IsOptional, IsString } from 'class-validator';
import { toIdList } from '../../../common/transforms/to-id-list.transform';
import { MovieFilters } from '../movie-filter';

export class MovieFilterDto implements MovieFilters {
  @IsOptional()
  @IsString()
  title?: string;

  @IsOptional()
  @Transform(toIdList)
  @IsArray()
  @IsMongoId({ each: true })
  genres?: string[];

  @IsOptional()
  @Transform(toIdList)
  @IsArray()
  @IsMongoId({ each: true })
  actors?: string[];
}
