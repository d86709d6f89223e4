// User Schema định nghĩa document User trong collection "users"
// Đăng nhập bằng email (không có username)

import { Prop, Schema, SchemaFactory } from '@nestjs/mongoose';
import { HydratedDocument } from 'mongoose';

// HydratedDocument<User> = User + các method của Mongoose (.save(), .toObject()...) + _id kiểu ObjectId
export type UserDocument = HydratedDocument<User>;

@Schema({
  timestamps: true, // tự động thêm createdAt, updatedAt
  collection: 'users',
})
export class User {
  // unique: true = MongoDB tự tạo unique index; lowercase để email không phân biệt hoa thường
  @Prop({ required: true, unique: true, lowercase: true, trim: true })
  email!: string;

  // select: false = mặc định KHÔNG trả về password khi query
  // Chỉ khi gọi .select('+password') mới lấy được
  @Prop({ required: true, select: false })
  password!: string;

  @Prop({ trim: true, default: '' })
  firstName!: string;

  @Prop({ trim: true, default: '' })
  lastName!: string;

  // Staff được phép tạo/sửa/xoá dữ liệu catalog
  @Prop({ default: false })
  isStaff!: boolean;

  @Prop({ default: true })
  isActive!: boolean;

  @Prop({ type: Date })
  lastLoginAt?: Date;
}

export const UserSchema = SchemaFactory.createForClass(User);
