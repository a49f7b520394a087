// JwtAuthGuard bảo vệ route - chỉ cho phép request có JWT hợp lệ mới vào được
// Guard này sử dụng JwtStrategy để verify token; thiếu/sai token → 401 Unauthorized

import { Injectable } from '@nestjs/common';
import { AuthGuard } from '@nestjs/passport';

@Injectable()
export class JwtAuthGuard extends AuthGuard('jwt') {}
