// JwtStrategy là Passport strategy để xác thực JWT token
// Token được đọc từ cookie 'access_token' (web) hoặc header Authorization: Bearer (API client)

import { Injectable, UnauthorizedException } from '@nestjs/common';
import { PassportStrategy } from '@nestjs/passport';
import { ExtractJwt, Strategy } from 'passport-jwt';
import { ConfigService } from '@nestjs/config';
import type { Request } from 'express';
import { UsersService } from '../../users/users.service';
import {
  AuthenticatedUser,
  JwtPayload,
} from '../interfaces/authenticated-user.interface';

export const ACCESS_TOKEN_COOKIE = 'access_token';

// Lấy JWT từ cookie (request.cookies được parse bởi cookie-parser trong app.setup.ts)
const fromAccessTokenCookie = (request: Request): string | null => {
  const cookies: Record<string, unknown> | undefined = request?.cookies;
  const token = cookies?.[ACCESS_TOKEN_COOKIE];
  return typeof token === 'string' && token.length > 0 ? token : null;
};

@Injectable()
export class JwtStrategy extends PassportStrategy(Strategy) {
  constructor(
    configService: ConfigService,
    private readonly usersService: UsersService,
  ) {
    const secret = configService.get<string>('auth.jwt.accessSecret');
    if (!secret) {
      throw new Error('JWT_ACCESS_SECRET is required');
    }
    super({
      // Thử cookie trước, sau đó tới header Authorization
      jwtFromRequest: ExtractJwt.fromExtractors([
        fromAccessTokenCookie,
        ExtractJwt.fromAuthHeaderAsBearerToken(),
      ]),
      secretOrKey: secret,
      // ignoreExpiration: false = kiểm tra token hết hạn
      ignoreExpiration: false,
    });
  }

  /**
   * Passport gọi hàm này sau khi verify chữ ký JWT thành công
   * @returns Object này sẽ được gán vào request.user (dùng trong controller/guard)
   */
  async validate(payload: JwtPayload): Promise<AuthenticatedUser> {
    // Tìm user trong database để đảm bảo user vẫn tồn tại và active
    const user = await this.usersService.findActiveById(payload.sub);

    if (!user) {
      throw new UnauthorizedException('User not found or inactive');
    }

    // Roles lấy từ database (không tin roles trong token) để thu hồi quyền có hiệu lực ngay
    return {
      userId: user._id.toString(),
      email: user.email,
      roles: user.roles,
    };
  }
}
