// UsersModule quản lý tất cả components liên quan đến User

import { Module } from '@nestjs/common';
import { MongooseModule } from '@nestjs/mongoose';
import { UsersService } from './users.service';
import { UsersController } from './users.controller';
import { User, UserSchema } from './schemas/user.schema';

@Module({
  // Đăng ký User schema để inject bằng @InjectModel(User.name)
  imports: [
    MongooseModule.forFeature([{ name: User.name, schema: UserSchema }]),
  ],
  controllers: [UsersController],
  providers: [UsersService],
  // AuthModule cần UsersService để login và verify JWT
  exports: [UsersService],
})
export class UsersModule {}
