// RolesGuard kiểm tra user có đủ roles để truy cập route không
// Guard này chạy SAU JwtAuthGuard (đảm bảo user đã được xác thực)
// Trả về false → Nest tự ném ForbiddenException (HTTP 403)

import { Injectable, CanActivate, ExecutionContext } from '@nestjs/common';
import { Reflector } from '@nestjs/core';
import { ROLES_KEY } from '../decorators/roles.decorator';
import type { AuthenticatedRequest } from '../interfaces/authenticated-user.interface';

@Injectable()
export class RolesGuard implements CanActivate {
  constructor(private reflector: Reflector) {}

  canActivate(context: ExecutionContext): boolean {
    // Lấy danh sách roles yêu cầu từ @Roles() decorator (method ưu tiên hơn class)
    const requiredRoles = this.reflector.getAllAndOverride<string[] | undefined>(
      ROLES_KEY,
      [context.getHandler(), context.getClass()],
    );

    // Nếu route không có @Roles() → cho phép truy cập (chỉ cần đăng nhập)
    if (!requiredRoles || requiredRoles.length === 0) {
      return true;
    }

    // Lấy user từ request (đã được set bởi JwtAuthGuard)
    const { user } = context
      .switchToHttp()
      .getRequest<Partial<AuthenticatedRequest>>();

    // Kiểm tra user có ít nhất 1 role trong requiredRoles không
    // VD: requiredRoles = ['admin'], user.roles = ['user', 'admin'] → true
    return requiredRoles.some((role) => user?.roles?.includes(role) ?? false);
  }
}
