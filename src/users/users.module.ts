// UsersModule quản lý tài khoản người dùng (đăng ký, hồ sơ cá nhân)
// AuthModule import module này để dùng UsersService khi login và verify JWT

import { Module } from '@nestjs/common';
import { MongooseModule } from '@nestjs/mongoose';
import { UsersService } from './users.service';
import { UsersController } from './users.controller';
import { User, UserSchema } from './schemas/user.schema';

@Module({
  // MongooseModule.forFeature() đăng ký User schema với Mongoose
  // Sau đó có thể inject User model vào UsersService bằng @InjectModel(User.name)
  imports: [
    MongooseModule.forFeature([{ name: User.name, schema: UserSchema }]),
  ],
  controllers: [UsersController],
  providers: [UsersService],
  exports: [UsersService],
})
export class UsersModule {}
