// Kiểu dữ liệu liên quan đến user đã xác thực
import type { Request } from 'express';

// Nội dung của JWT (payload) khi AuthService ký token
export interface JwtPayload {
  sub: string; // sub = subject (userId)
  email: string;
  roles: string[];
}

// Object mà JwtStrategy.validate() trả về → Passport gán vào request.user
export interface AuthenticatedUser {
  userId: string;
  email: string;
  roles: string[];
}

// Request sau khi đi qua JwtAuthGuard
export interface AuthenticatedRequest extends Request {
  user: AuthenticatedUser;
}
