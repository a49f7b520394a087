// UsersService chứa logic nghiệp vụ (business logic) cho User
// Service này được inject vào Controller (và AuthService, JwtStrategy) để xử lý request

import {
  BadRequestException,
  Injectable,
  Logger,
  NotFoundException,
} from '@nestjs/common';
import { InjectModel } from '@nestjs/mongoose';
import { Model } from 'mongoose';
import * as bcrypt from 'bcrypt';
import { User, UserDocument } from './schemas/user.schema';
import { CreateUserDto } from './dto/create-user.dto';
import { UpdateUserDto } from './dto/update-user.dto';

// Số vòng salt của bcrypt
const SALT_ROUNDS = 10;

@Injectable()
export class UsersService {
  private readonly logger = new Logger(UsersService.name);

  // InjectModel là cách Nest inject Mongoose model vào service
  constructor(@InjectModel(User.name) private userModel: Model<UserDocument>) {}

  /**
   * Đăng ký user mới
   * @returns User document đã lưu vào MongoDB
   */
  async create(createUserDto: CreateUserDto): Promise<UserDocument> {
    const email = createUserDto.email.toLowerCase();

    // Email là unique → báo lỗi 400 rõ ràng thay vì để MongoDB ném duplicate key
    const existing = await this.userModel.exists({ email }).exec();
    if (existing) {
      throw new BadRequestException('User with this email already exists');
    }

    // Hash password bằng bcrypt, không bao giờ lưu password gốc
    const hashedPassword = await bcrypt.hash(
      createUserDto.password,
      SALT_ROUNDS,
    );

    const user = await this.userModel.create({
      ...createUserDto,
      email,
      password: hashedPassword,
    });
    this.logger.log(`Registered user ${user._id.toString()}`);
    return user;
  }

  /**
   * Tìm user theo ID
   * @returns User document (không có password)
   */
  async findOne(id: string): Promise<UserDocument> {
    const user = await this.userModel.findById(id).select('-password').exec();

    // Nếu không tìm thấy, throw NotFoundException (Nest tự convert thành HTTP 404)
    if (!user) {
      throw new NotFoundException(`User with ID ${id} not found`);
    }

    return user;
  }

  /**
   * Tìm user còn active theo ID (dùng trong JwtStrategy)
   * Trả về null thay vì throw để guard tự quyết định 401
   */
  async findActiveById(id: string): Promise<UserDocument | null> {
    const user = await this.userModel.findById(id).select('-password').exec();
    if (!user || !user.isActive) {
      return null;
    }
    return user;
  }

  /**
   * Tìm user theo email (dùng cho login)
   * @param includePassword - true = trả về cả password (cần cho login)
   */
  async findByEmail(
    email: string,
    includePassword = false,
  ): Promise<UserDocument | null> {
    // Nếu cần password (khi login), dùng .select('+password') để override select: false
    const query = this.userModel.findOne({ email: email.toLowerCase() });
    if (includePassword) {
      query.select('+password');
    }
    return query.exec();
  }

  /**
   * Cập nhật hồ sơ user
   * @param updateUserDto - chỉ cần gửi các field muốn đổi
   */
  async update(
    id: string,
    updateUserDto: UpdateUserDto,
  ): Promise<UserDocument> {
    const payload: Partial<Pick<User, 'email' | 'password' | 'name'>> = {};
    if (updateUserDto.email !== undefined) {
      const email = updateUserDto.email.toLowerCase();
      // Email thuộc user khác → 400 như lúc đăng ký
      const taken = await this.userModel
        .exists({ email, _id: { $ne: id } })
        .exec();
      if (taken) {
        throw new BadRequestException('User with this email already exists');
      }
      payload.email = email;
    }
    if (updateUserDto.name !== undefined) {
      payload.name = updateUserDto.name;
    }
    if (updateUserDto.password !== undefined) {
      payload.password = await bcrypt.hash(updateUserDto.password, SALT_ROUNDS);
    }

    // { new: true } = trả về document SAU KHI update
    const updatedUser = await this.userModel
      .findByIdAndUpdate(id, payload, { new: true })
      .select('-password')
      .exec();

    if (!updatedUser) {
      throw new NotFoundException(`User with ID ${id} not found`);
    }

    return updatedUser;
  }

  /**
   * Cập nhật thời gian đăng nhập cuối cùng
   */
  async updateLastLogin(userId: string): Promise<void> {
    await this.userModel
      .findByIdAndUpdate(userId, { lastLoginAt: new Date() })
      .exec();
  }
}
