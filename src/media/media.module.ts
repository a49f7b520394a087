// MediaModule - cung cấp MediaStorageService cho các module cần lưu file (VD: poster phim)
import { Module } from '@nestjs/common';
import { MediaStorageService } from './media-storage.service';

@Module({
  providers: [MediaStorageService],
  exports: [MediaStorageService],
})
export class MediaModule {}
