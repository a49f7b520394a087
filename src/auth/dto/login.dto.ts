// Body của POST /auth/login
import { IsEmail, IsNotEmpty, IsString, MaxLength } from 'class-validator';

export class LoginDto {
  @IsNotEmpty()
  @IsEmail()
  email!: string;

  // bcrypt chỉ dùng 72 byte đầu của mật khẩu
  @IsNotEmpty()
  @IsString()
  @MaxLength(72)
  password!: string;
}
