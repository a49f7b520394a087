// File này dùng để kiểm tra (validate) biến môi trường khi app khởi động.
// Nếu thiếu hoặc sai kiểu dữ liệu, app sẽ báo lỗi sớm, giúp bạn dễ debug hơn.

import { plainToInstance, Transform } from 'class-transformer';
import {
  IsBoolean,
  IsEnum,
  IsNotEmpty,
  IsNumber,
  IsOptional,
  IsString,
  validateSync,
} from 'class-validator';

// Khai báo enum cho NODE_ENV để giới hạn giá trị hợp lệ
enum Environment {
  Development = 'development',
  Production = 'production',
  Test = 'test',
}

// Lớp này mô tả "hợp đồng" cho các biến môi trường mà app cần
class EnvironmentVariables {
  @IsEnum(Environment)
  NODE_ENV: Environment = Environment.Development;

  @IsNumber()
  PORT: number = 3000;

  // Chuỗi URI kết nối MongoDB bắt buộc phải có, không được rỗng
  @IsString()
  @IsNotEmpty()
  MONGODB_URI!: string;

  // Secret để ký JWT bắt buộc phải có
  @IsString()
  @IsNotEmpty()
  JWT_ACCESS_SECRET!: string;

  @IsString()
  @IsOptional()
  JWT_ACCESS_EXPIRES?: string = '15m';

  @IsString()
  COOKIE_DOMAIN: string = 'localhost';

  // Chỉ chuỗi 'true' mới bật
  @Transform(({ value }) => value === true || value === 'true')
  @IsBoolean()
  COOKIE_SECURE: boolean = false;

  // Thư mục lưu poster phim
  @IsString()
  @IsNotEmpty()
  MEDIA_ROOT: string = './media';

  // Prefix URL public của media, nên kết thúc bằng '/'
  @IsString()
  @IsNotEmpty()
  MEDIA_URL: string = '/media/';
}

// Hàm validate được ConfigModule gọi khi app khởi động
export function validate(config: Record<string, unknown>) {
  // Chuyển plain object (key/value từ process.env) thành instance của EnvironmentVariables
  const validated = plainToInstance(EnvironmentVariables, config, {
    // Tự động convert kiểu (VD: '3000' -> 3000)
    enableImplicitConversion: true,
  });

  const errors = validateSync(validated, {
    skipMissingProperties: false,
  });

  // Nếu có lỗi, gom message lại thành 1 chuỗi và ném ra Error
  if (errors.length > 0) {
    throw new Error(
      `Config validation error: ${errors
        .map((error) => Object.values(error.constraints ?? {}).join(', '))
        .join('; ')}`,
    );
  }

  return validated;
}
