// Cấu hình JwtModule từ ConfigService (auth.jwt.*)
import { ConfigService } from '@nestjs/config';
import type { JwtModuleOptions } from '@nestjs/jwt';

export const DEFAULT_ACCESS_EXPIRES = '15m';

export function jwtOptionsFactory(
  configService: ConfigService,
): JwtModuleOptions {
  const secret = configService.get<string>('auth.jwt.accessSecret');
  if (!secret) {
    throw new Error('JWT_ACCESS_SECRET is required');
  }
  return {
    secret,
    signOptions: {
      expiresIn:
        configService.get<string>('auth.jwt.accessExpiresIn') ||
        DEFAULT_ACCESS_EXPIRES,
    },
  };
}
