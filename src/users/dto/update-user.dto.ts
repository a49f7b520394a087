// UpdateUserDto dùng khi user tự cập nhật hồ sơ của mình (PATCH /users/me)
// Tất cả field đều optional; roles/isActive KHÔNG được phép tự sửa

import {
  IsEmail,
  IsOptional,
  IsString,
  MinLength,
} from 'class-validator';

export class UpdateUserDto {
  @IsOptional()
  @IsEmail()
  email?: string;

  // Nếu có password mới thì service sẽ hash lại trước khi lưu
  @IsOptional()
  @MinLength(5)
  password?: string;

  @IsOptional()
  @IsString()
  name?: string;
}
