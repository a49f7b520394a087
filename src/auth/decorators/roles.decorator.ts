// @Roles(ADMIN_ROLE) → route chỉ dành cho admin, RolesGuard đọc metadata này
import { SetMetadata } from '@nestjs/common';
import type { UserRole } from '../../users/schemas/user.schema';

export const ROLES_KEY = 'roles';
export const Roles = (...roles: UserRole[]) => SetMetadata(ROLES_KEY, roles);
