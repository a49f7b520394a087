// MediaStorageService - lưu/xoá file ảnh trên disk (MEDIA_ROOT) và dựng URL public (MEDIA_URL)
// Database chỉ lưu đường dẫn tương đối (VD: "uploads/movies/avatar-<uuid>.jpg")

import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { mkdir, unlink, writeFile } from 'fs/promises';
import path from 'path';
import sharp from 'sharp';
import { v4 as uuidv4 } from 'uuid';
import { InvalidImageException } from './invalid-image.exception';
import { slugify } from './slugify';

// Định dạng ảnh raster được chấp nhận → đuôi file khi lưu
const IMAGE_EXTENSIONS: Partial<Record<keyof sharp.FormatEnum, string>> = {
  jpeg: 'jpg',
  png: 'png',
  webp: 'webp',
  gif: 'gif',
  tiff: 'tiff',
  avif: 'avif',
  heif: 'heic',
};

export interface StoredImage {
  // Đường dẫn tương đối so với MEDIA_ROOT (lưu vào database)
  path: string;
  format: string;
  width: number;
  height: number;
}

// Không dùng instanceof Error: lỗi fs có thể đến từ realm khác (VD: Jest VM)
const isErrnoException = (error: unknown): error is NodeJS.ErrnoException =>
  typeof error === 'object' && error !== null && 'code' in error;

@Injectable()
export class MediaStorageService {
  private readonly logger = new Logger(MediaStorageService.name);
  private readonly root: string;
  private readonly baseUrl: string;

  constructor(configService: ConfigService) {
    this.root = path.resolve(
      configService.get<string>('media.root') ?? './media',
    );
    const url = configService.get<string>('media.url') ?? '/media/';
    this.baseUrl = url.endsWith('/') ? url : `${url}/`;
  }

  // Thư mục gốc tuyệt đối (main dùng để serve static)
  get rootDir(): string {
    return this.root;
  }

  get publicPrefix(): string {
    return this.baseUrl;
  }

  /**
   * Giải mã ảnh bằng sharp để chắc chắn bytes là ảnh raster hợp lệ
   * @throws InvalidImageException nếu không đọc được hoặc định dạng không hỗ trợ
   */
  async inspectImage(buffer: Buffer) {
    try {
      const image = sharp(buffer);
      const { format, width, height } = await image.metadata();
      const extension = format ? IMAGE_EXTENSIONS[format] : undefined;
      if (!format || !extension || !width || !height) {
        throw new InvalidImageException();
      }
      // stats() buộc sharp decode toàn bộ pixel → phát hiện file bị cắt cụt
      await image.stats();
      return { format, extension, width, height };
    } catch (error) {
      if (error instanceof InvalidImageException) {
        throw error;
      }
      const reason = error instanceof Error ? error.message : String(error);
      this.logger.warn(`Rejected image payload: ${reason}`);
      throw new InvalidImageException();
    }
  }

  /**
   * Validate rồi ghi ảnh vào <MEDIA_ROOT>/<directory>/<slug>-<uuid>.<ext>
   * @param baseName - chuỗi dùng làm phần đầu tên file (VD: tên phim)
   */
  async saveImage(
    buffer: Buffer,
    directory: string,
    baseName: string,
  ): Promise<StoredImage> {
    const { format, extension, width, height } =
      await this.inspectImage(buffer);

    const fileName = `${slugify(baseName, 'image')}-${uuidv4()}.${extension}`;
    const relativePath = path.posix.join(directory, fileName);
    const absolutePath = this.resolve(relativePath);

    await mkdir(path.dirname(absolutePath), { recursive: true });
    await writeFile(absolutePath, buffer);

    this.logger.log(`Stored ${format} image ${relativePath}`);
    return { path: relativePath, format, width, height };
  }

  /**
   * Xoá file theo đường dẫn tương đối
   * @returns false nếu file đã không còn trên disk
   */
  async delete(relativePath: string): Promise<boolean> {
    try {
      await unlink(this.resolve(relativePath));
      this.logger.log(`Deleted ${relativePath}`);
      return true;
    } catch (error) {
      if (isErrnoException(error) && error.code === 'ENOENT') {
        this.logger.warn(`File ${relativePath} was already missing`);
        return false;
      }
      throw error;
    }
  }

  // Đường dẫn tuyệt đối trên disk, không cho phép thoát ra ngoài MEDIA_ROOT
  resolve(relativePath: string): string {
    const absolutePath = path.resolve(this.root, relativePath);
    if (!absolutePath.startsWith(this.root + path.sep)) {
      throw new Error(`Path ${relativePath} escapes the media root`);
    }
    return absolutePath;
  }

  // URL public của file, null khi chưa có file
  urlFor(relativePath: string | null | undefined): string | null {
    if (!relativePath) {
      return null;
    }
    return `${this.baseUrl}${relativePath}`;
  }
}
