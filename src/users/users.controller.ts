// UsersController xử lý HTTP requests liên quan đến User
// Controller nhận request từ client → gọi Service → trả về response

import {
  Controller,
  Get,
  Post,
  Body,
  Patch,
  Req,
  HttpCode,
  HttpStatus,
  UseGuards,
} from '@nestjs/common';
import { UsersService } from './users.service';
import { CreateUserDto } from './dto/create-user.dto';
import { UpdateUserDto } from './dto/update-user.dto';
import { presentUser, UserResponse } from './user.presenter';
import { JwtAuthGuard } from '../auth/guards/jwt-auth.guard';
import type { AuthenticatedRequest } from '../auth/interfaces/authenticated-user.interface';

@Controller('users') // base path cho tất cả routes trong controller này = "/users"
export class UsersController {
  constructor(private readonly usersService: UsersService) {}

  /**
   * POST /users
   * Đăng ký tài khoản mới (công khai, không cần JWT)
   * @returns User vừa tạo (không có password)
   */
  @Post()
  @HttpCode(HttpStatus.CREATED)
  async create(@Body() createUserDto: CreateUserDto): Promise<UserResponse> {
    // ValidationPipe (đã cấu hình trong app.setup.ts) sẽ validate createUserDto
    // Nếu không hợp lệ → tự động trả về HTTP 400 Bad Request
    const user = await this.usersService.create(createUserDto);
    return presentUser(user);
  }

  /**
   * GET /users/me
   * Lấy hồ sơ của user đang đăng nhập
   */
  @Get('me')
  @UseGuards(JwtAuthGuard)
  async me(@Req() req: AuthenticatedRequest): Promise<UserResponse> {
    // req.user.userId được set bởi JwtStrategy.validate()
    const user = await this.usersService.findOne(req.user.userId);
    return presentUser(user);
  }

  /**
   * PATCH /users/me
   * Cập nhật hồ sơ của chính mình
   */
  @Patch('me')
  @UseGuards(JwtAuthGuard)
  async updateMe(
    @Req() req: AuthenticatedRequest,
    @Body() updateUserDto: UpdateUserDto,
  ): Promise<UserResponse> {
    const user = await this.usersService.update(
      req.user.userId,
      updateUserDto,
    );
    return presentUser(user);
  }
}
