// File main.ts là entrypoint của ứng dụng NestJS.
// Hàm bootstrap() sẽ được gọi đầu tiên để khởi động app.

import 'reflect-metadata';
import { NestFactory } from '@nestjs/core';
import { Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import type { NestExpressApplication } from '@nestjs/platform-express';
import { AppModule } from './app.module';
import { configureApp } from './app.setup';

async function bootstrap() {
  // Tạo instance ứng dụng Nest (Express) sử dụng AppModule làm root module
  const app = await NestFactory.create<NestExpressApplication>(AppModule);
  configureApp(app);

  // Lấy ConfigService từ DI container để đọc cấu hình đã định nghĩa ở configuration.ts
  const configService = app.get(ConfigService);
  const port = configService.get<number>('port') ?? 3000;

  await app.listen(port);
  logger.log(`Cinema catalog API listening on port ${port}`);
}

// Logger dùng để log lỗi nếu quá trình khởi động thất bại
const logger = new Logger('Bootstrap');

// Gọi hàm bootstrap và bắt lỗi nếu có (VD: kết nối DB thất bại)
bootstrap().catch((error: unknown) => {
  logger.error('Failed to bootstrap application', error);
  process.exit(1);
});
