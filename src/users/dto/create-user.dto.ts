// CreateUserDto định nghĩa dữ liệu đầu vào khi đăng ký tài khoản mới
// class-validator sẽ tự động validate các field này trước khi vào controller

import {
  IsEmail,
  IsNotEmpty,
  IsOptional,
  IsString,
  MinLength,
} from 'class-validator';

export class CreateUserDto {
  // @IsEmail() = phải đúng format email (có @, domain...)
  @IsNotEmpty()
  @IsEmail()
  email!: string;

  // @MinLength() = mật khẩu tối thiểu 5 ký tự
  @IsNotEmpty()
  @MinLength(5)
  password!: string;

  // @IsOptional() = có thể không có (không bắt buộc)
  @IsOptional()
  @IsString()
  name?: string;
}
