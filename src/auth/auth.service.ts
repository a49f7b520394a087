// AuthService xử lý logic đăng nhập và tạo JWT token

import { Injectable, Logger, UnauthorizedException } from '@nestjs/common';
import { JwtService } from '@nestjs/jwt';
import * as bcrypt from 'bcrypt';
import { UsersService } from '../users/users.service';
import { presentUser, UserResponse } from '../users/user.presenter';
import { LoginDto } from './dto/login.dto';
import { JwtPayload } from './interfaces/authenticated-user.interface';

export interface LoginResult {
  accessToken: string;
  // Thời điểm token hết hạn (claim exp), dùng làm hạn của cookie
  expiresAt?: Date;
  user: UserResponse;
}

@Injectable()
export class AuthService {
  private readonly logger = new Logger(AuthService.name);

  constructor(
    private usersService: UsersService,
    private jwtService: JwtService, // JwtService do @nestjs/jwt cung cấp, dùng để tạo/verify JWT
  ) {}

  /**
   * Đăng nhập user
   * @returns JWT token (sẽ được set vào cookie ở controller)
   */
  async login(loginDto: LoginDto): Promise<LoginResult> {
    // Tìm user theo email (cần lấy cả password để so sánh)
    const user = await this.usersService.findByEmail(loginDto.email, true);

    // Nếu không tìm thấy user hoặc user không active → throw Unauthorized
    if (!user || !user.isActive) {
      throw new UnauthorizedException('Invalid credentials');
    }

    // bcrypt.compare() tự động hash password đầu vào và so sánh với hash trong DB
    const isPasswordValid = await bcrypt.compare(
      loginDto.password,
      user.password,
    );

    if (!isPasswordValid) {
      this.logger.warn(`Failed login for user ${user._id.toString()}`);
      throw new UnauthorizedException('Invalid credentials');
    }

    const payload: JwtPayload = {
      sub: user._id.toString(),
      email: user.email,
      roles: user.roles,
    };

    // JwtService đã được cấu hình trong AuthModule với secret và expiresIn
    const accessToken = this.jwtService.sign(payload);
    const { exp } = this.jwtService.decode<{ exp?: number }>(accessToken);

    await this.usersService.updateLastLogin(user._id.toString());

    return {
      accessToken,
      expiresAt: exp ? new Date(exp * 1000) : undefined,
      user: presentUser(user),
    };
  }
}
