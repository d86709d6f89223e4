// UsersController: đăng ký tài khoản và hồ sơ của chính user đang đăng nhập
// base path = "/api/user"

import {
  Controller,
  Get,
  Post,
  Body,
  Patch,
  HttpCode,
  HttpStatus,
  UseGuards,
} from '@nestjs/common';
import { UsersService } from './users.service';
import { CreateUserDto } from './dto/create-user.dto';
import { UpdateUserDto } from './dto/update-user.dto';
import { JwtAuthGuard } from '../auth/guards/jwt-auth.guard';
import { AuthenticatedGuard } from '../auth/guards/authenticated.guard';
import { CurrentUser } from '../auth/decorators/current-user.decorator';
import type { Caller } from '../auth/interfaces/caller.interface';

@Controller('user')
export class UsersController {
  constructor(private readonly usersService: UsersService) {}

  /**
   * POST /api/user/register
   * Đăng ký user mới - không cần JWT
   */
  @Post('register')
  @HttpCode(HttpStatus.CREATED)
  register(@Body() createUserDto: CreateUserDto) {
    return this.usersService.create(createUserDto);
  }

  // GET /api/user/me - hồ sơ của user đang đăng nhập
  @Get('me')
  @UseGuards(JwtAuthGuard, AuthenticatedGuard)
  me(@CurrentUser() caller: Caller) {
    // AuthenticatedGuard đảm bảo caller luôn có ở đây
    return this.usersService.findOne(caller.userId);
  }

  // PATCH /api/user/me - cập nhật hồ sơ (tên, email, mật khẩu)
  @Patch('me')
  @UseGuards(JwtAuthGuard, AuthenticatedGuard)
  updateMe(@CurrentUser() caller: Caller, @Body() updateUserDto: UpdateUserDto) {
    return this.usersService.update(caller.userId, updateUserDto);
  }
}
