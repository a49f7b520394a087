// Lỗi khi file upload không phải ảnh raster hợp lệ → HTTP 400
import { BadRequestException } from '@nestjs/common';

export const INVALID_IMAGE_MESSAGE =
  'Upload a valid image. The file you uploaded was either not an image or a corrupted image.';

export class InvalidImageException extends BadRequestException {
  constructor(message = INVALID_IMAGE_MESSAGE) {
    super(message);
  }
}
