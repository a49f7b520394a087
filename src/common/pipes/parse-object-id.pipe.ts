// ParseObjectIdPipe - kiểm tra path param ':id' có phải ObjectId hợp lệ không
// Id sai định dạng thì chắc chắn không có bản ghi nào → trả về 404 thay vì để Mongoose ném CastError (500)

import { Injectable, NotFoundException, PipeTransform } from '@nestjs/common';
import { isObjectIdOrHexString } from 'mongoose';

@Injectable()
export class ParseObjectIdPipe implements PipeTransform<string, string> {
  transform(value: string): string {
    if (!isObjectIdOrHexString(value)) {
      throw new NotFoundException(`Resource with ID ${value} not found`);
    }
    return value;
  }
}
