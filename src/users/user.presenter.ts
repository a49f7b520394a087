// Chuyển User document thành object trả về cho client (không bao giờ có password)
import { Types } from 'mongoose';

export interface UserRecord {
  _id: Types.ObjectId;
  email: string;
  name?: string;
  roles: string[];
}

export interface UserResponse {
  id: string;
  email: string;
  name: string | null;
  roles: string[];
  is_admin: boolean;
}

export function presentUser(user: UserRecord): UserResponse {
  return {
    id: user._id.toString(),
    email: user.email,
    name: user.name ?? null,
    roles: user.roles,
    is_admin: user.roles.includes('admin'),
  };
}
