// AuthController xử lý các request liên quan đến authentication

import {
  Controller,
  Post,
  Body,
  Res,
  HttpCode,
  HttpStatus,
} from '@nestjs/common';
import type { CookieOptions, Response } from 'express';
import { ConfigService } from '@nestjs/config';
import { AuthService } from './auth.service';
import { LoginDto } from './dto/login.dto';
import { ACCESS_TOKEN_COOKIE } from './strategies/jwt.strategy';

@Controller('auth') // base path = "/auth"
export class AuthController {
  constructor(
    private readonly authService: AuthService,
    private readonly configService: ConfigService,
  ) {}

  /**
   * POST /auth/login
   * Đăng nhập user, set JWT vào HTTP-only cookie
   * Token cũng được trả trong body cho client không dùng cookie (mobile, CLI...)
   */
  @Post('login')
  @HttpCode(HttpStatus.OK)
  async login(
    @Body() loginDto: LoginDto,
    @Res({ passthrough: true }) res: Response,
  ) {
    // passthrough: true = vẫn cho phép Nest trả về JSON response (không bị override)
    const { accessToken, expiresAt, user } =
      await this.authService.login(loginDto);

    // Cookie hết hạn cùng lúc với token (JWT_ACCESS_EXPIRES)
    res.cookie(ACCESS_TOKEN_COOKIE, accessToken, {
      ...this.cookieOptions(),
      expires: expiresAt,
    });

    return {
      message: 'Login successful',
      access_token: accessToken,
      user,
    };
  }

  /**
   * POST /auth/logout
   * Đăng xuất user (xóa cookie)
   */
  @Post('logout')
  @HttpCode(HttpStatus.OK)
  logout(@Res({ passthrough: true }) res: Response) {
    // Xóa cookie bằng cách set lại với maxAge = 0
    res.cookie(ACCESS_TOKEN_COOKIE, '', {
      ...this.cookieOptions(),
      maxAge: 0,
    });

    return {
      message: 'Logout successful',
    };
  }

  private cookieOptions(): CookieOptions {
    return {
      httpOnly: true, // JavaScript không thể đọc cookie này (chống XSS)
      secure: this.configService.get<boolean>('cookies.secure'), // true = chỉ gửi qua HTTPS
      sameSite: 'strict', // chống CSRF attack
      domain: this.configService.get<string>('cookies.domain'),
    };
  }
}
