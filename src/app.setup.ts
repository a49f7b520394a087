// Cấu hình dùng chung cho app thật (main.ts) và app trong e2e test
// để cả hai chạy cùng middleware, ValidationPipe và static media

import { ValidationPipe } from '@nestjs/common';
import type { NestExpressApplication } from '@nestjs/platform-express';
import helmet from 'helmet';
import cookieParser from 'cookie-parser';
import { MediaStorageService } from './media/media-storage.service';

export function configureApp(
  app: NestExpressApplication,
): NestExpressApplication {
  // Bật Helmet để thêm các HTTP header bảo mật
  // crossOriginResourcePolicy = cross-origin để frontend ở domain khác hiển thị được poster
  app.use(helmet({ crossOriginResourcePolicy: { policy: 'cross-origin' } }));

  // Dùng cookie-parser để JwtStrategy đọc được cookie access_token
  app.use(cookieParser());

  // Global ValidationPipe:
  // - tự động validate DTO theo class-validator (lỗi → 400)
  // - loại bỏ field thừa không khai báo trong DTO (whitelist)
  // - tự convert kiểu dữ liệu (string -> number, v.v.), cần cho multipart và query string
  app.useGlobalPipes(
    new ValidationPipe({
      whitelist: true,
      transform: true,
      transformOptions: {
        enableImplicitConversion: true,
      },
    }),
  );

  // Serve file trong MEDIA_ROOT tại MEDIA_URL (chỉ khi MEDIA_URL là đường dẫn tương đối)
  const media = app.get(MediaStorageService);
  if (media.publicPrefix.startsWith('/')) {
    app.useStaticAssets(media.rootDir, {
      prefix: media.publicPrefix.replace(/\/+$/, ''),
    });
  }

  return app;
}
