// UsersService chứa business logic cho User: đăng ký, đọc/sửa hồ sơ, tài khoản staff

import {
  ConflictException,
  Injectable,
  Logger,
  NotFoundException,
} from '@nestjs/common';
import { InjectModel } from '@nestjs/mongoose';
import { isValidObjectId, Model } from 'mongoose';
import * as bcrypt from 'bcrypt';
import { User, UserDocument } from './schemas/user.schema';
import { CreateUserDto } from './dto/create-user.dto';
import { UpdateUserDto } from './dto/update-user.dto';
import type { UserResponse } from './interfaces/user-response.interface';
import { isDuplicateKeyError } from '../common/utils/mongo-errors';

// Số vòng salt của bcrypt
const SALT_ROUNDS = 10;

@Injectable()
export class UsersService {
  private readonly logger = new Logger(UsersService.name);

  constructor(
    @InjectModel(User.name) private readonly userModel: Model<UserDocument>,
  ) {}

  /**
   * Đăng ký user thường (isStaff = false)
   * @throws ConflictException nếu email đã tồn tại
   */
  async create(createUserDto: CreateUserDto): Promise<UserResponse> {
    await this.assertEmailAvailable(createUserDto.email);

    const newUser = new this.userModel({
      ...createUserDto,
      password: await bcrypt.hash(createUserDto.password, SALT_ROUNDS),
      isStaff: false,
    });
    // 2 request đăng ký cùng email cùng lúc: unique index chặn request thứ 2
    const saved = await newUser.save().catch((error: unknown) => {
      if (isDuplicateKeyError(error)) {
        throw new ConflictException('User with this email already exists');
      }
      throw error;
    });

    this.logger.log(`Registered user ${saved._id.toString()}`);
    return this.toResponse(saved);
  }

  /**
   * Tạo tài khoản staff, hoặc nâng quyền + đặt lại mật khẩu nếu email đã có
   * Chỉ dùng từ script create-staff-user (không có endpoint HTTP)
   */
  async upsertStaff(email: string, password: string): Promise<UserResponse> {
    const hashedPassword = await bcrypt.hash(password, SALT_ROUNDS);

    const staff = await this.userModel
      .findOneAndUpdate(
        { email: email.toLowerCase() },
        { password: hashedPassword, isStaff: true, isActive: true },
        { new: true, upsert: true, setDefaultsOnInsert: true },
      )
      .exec();

    if (!staff) {
      throw new Error(`Could not create staff account for ${email}`);
    }

    this.logger.log(`Staff account ready: ${staff.email}`);
    return this.toResponse(staff);
  }

  /**
   * Tìm user theo ID, trả về null nếu không có (kể cả khi ID sai định dạng)
   * Dùng cho JwtStrategy: thiếu user phải thành 401 chứ không phải 404
   */
  async findById(id: string): Promise<UserDocument | null> {
    if (!isValidObjectId(id)) {
      return null;
    }
    return this.userModel.findById(id).exec();
  }

  // Hồ sơ user (GET /api/user/me)
  async findOne(id: string): Promise<UserResponse> {
    const user = await this.findById(id);

    if (!user) {
      throw new NotFoundException(`User with ID ${id} not found`);
    }

    return this.toResponse(user);
  }

  /**
   * Tìm user theo email (dùng cho login)
   * @param includePassword - true = lấy cả password hash (field có select: false)
   */
  async findByEmail(
    email: string,
    includePassword = false,
  ): Promise<UserDocument | null> {
    const query = this.userModel.findOne({ email: email.toLowerCase() });
    if (includePassword) {
      query.select('+password');
    }
    return query.exec();
  }

  async update(id: string, updateUserDto: UpdateUserDto): Promise<UserResponse> {
    const changes: Partial<User> = { ...updateUserDto };

    if (updateUserDto.email) {
      await this.assertEmailAvailable(updateUserDto.email, id);
    }
    if (updateUserDto.password) {
      changes.password = await bcrypt.hash(updateUserDto.password, SALT_ROUNDS);
    }

    // { new: true } = trả về document SAU KHI update
    const updatedUser = await this.userModel
      .findByIdAndUpdate(id, changes, { new: true, runValidators: true })
      .exec();

    if (!updatedUser) {
      throw new NotFoundException(`User with ID ${id} not found`);
    }

    return this.toResponse(updatedUser);
  }

  async updateLastLogin(userId: string): Promise<void> {
    await this.userModel
      .findByIdAndUpdate(userId, { lastLoginAt: new Date() })
      .exec();
  }

  private async assertEmailAvailable(email: string, exceptUserId?: string) {
    const existing = await this.userModel
      .findOne({ email: email.toLowerCase() })
      .select('_id')
      .exec();

    if (existing && existing._id.toString() !== exceptUserId) {
      throw new ConflictException('User with this email already exists');
    }
  }

  private toResponse(user: UserDocument): UserResponse {
    return {
      id: user._id.toString(),
      email: user.email,
      firstName: user.firstName,
      lastName: user.lastName,
      isStaff: user.isStaff,
    };
  }
}
