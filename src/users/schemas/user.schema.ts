// User Schema định nghĩa cấu trúc document User trong MongoDB collection "users"
// Mongoose sẽ tự động tạo collection "users" nếu chưa có

import { Prop, Schema, SchemaFactory } from '@nestjs/mongoose';
import { HydratedDocument } from 'mongoose';

// Các role hợp lệ: 'user' = khách xem catalog, 'admin' = quản trị catalog
export const USER_ROLE = 'user';
export const ADMIN_ROLE = 'admin';
export type UserRole = typeof USER_ROLE | typeof ADMIN_ROLE;

// UserDocument = User + các method của Mongoose document (.save(), .toJSON()...)
// HydratedDocument đảm bảo _id có kiểu Types.ObjectId
export type UserDocument = HydratedDocument<User>;

@Schema({
  timestamps: true, // tự động thêm createdAt, updatedAt
  collection: 'users',
})
export class User {
  // unique: true = không được trùng email (MongoDB tự tạo index)
  @Prop({ required: true, unique: true, lowercase: true, trim: true })
  email!: string;

  // select: false = khi query user, mặc định KHÔNG trả về password (bảo mật)
  // Chỉ khi nào bạn gọi .select('+password') thì mới lấy được
  @Prop({ required: true, select: false })
  password!: string;

  @Prop({ trim: true })
  name?: string;

  // [String] = mảng các string (roles: ["user", "admin"]...)
  @Prop({ type: [String], default: [USER_ROLE] })
  roles!: string[];

  @Prop({ default: true })
  isActive!: boolean;

  @Prop({ type: Date })
  lastLoginAt?: Date;
}

export const UserSchema = SchemaFactory.createForClass(User);
