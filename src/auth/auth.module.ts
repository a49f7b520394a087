// AuthModule: đăng nhập/đăng xuất bằng JWT trong cookie, Passport strategy cho guard

import { Module } from '@nestjs/common';
import { JwtModule } from '@nestjs/jwt';
import { PassportModule } from '@nestjs/passport';
import { ConfigModule, ConfigService } from '@nestjs/config';
import { AuthService } from './auth.service';
import { AuthController } from './auth.controller';
import { JwtStrategy } from './strategies/jwt.strategy';
import { jwtOptionsFactory } from './jwt-options.factory';
import { UsersModule } from '../users/users.module';

@Module({
  imports: [
    // UsersService dùng trong AuthService (login) và JwtStrategy (load user)
    UsersModule,
    PassportModule,
    // JwtService ký token với secret/expiresIn trong config
    JwtModule.registerAsync({
      imports: [ConfigModule],
      useFactory: jwtOptionsFactory,
      inject: [ConfigService],
    }),
  ],
  controllers: [AuthController],
  providers: [AuthService, JwtStrategy],
  // PassportModule để các module catalog dùng được JwtAuthGuard
  exports: [AuthService, PassportModule],
})
export class AuthModule {}
