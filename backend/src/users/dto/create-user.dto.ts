// CreateUserDto - dữ liệu đăng ký tài khoản (POST /api/user/register)
// isStaff không có ở đây: ValidationPipe (whitelist) sẽ loại bỏ nếu client cố gửi lên

import {
  IsEmail,
  IsNotEmpty,
  IsOptional,
  IsString,
  MaxLength,
  MinLength,
} from 'class-validator';

export class CreateUserDto {
  @IsNotEmpty()
  @IsEmail()
  email!: string;

  // Mật khẩu tối thiểu 5 ký tự
  @IsNotEmpty()
  @IsString()
  @MinLength(5)
  password!: string;

  @IsOptional()
  @IsString()
  @MaxLength(150)
  firstName?: string;

  @IsOptional()
  @IsString()
  @MaxLength(150)
  lastName?: string;
}
