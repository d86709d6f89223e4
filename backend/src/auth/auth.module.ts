// AuthModule quản lý authentication (JWT) và các guard phân quyền

import { Module } from '@nestjs/common';
import { JwtModule } from '@nestjs/jwt';
import { PassportModule } from '@nestjs/passport';
import { ConfigModule, ConfigService } from '@nestjs/config';
import { AuthService } from './auth.service';
import { AuthController } from './auth.controller';
import { JwtStrategy } from './strategies/jwt.strategy';
import { UsersModule } from '../users/users.module';

@Module({
  imports: [
    // Import UsersModule để dùng UsersService trong AuthService và JwtStrategy
    UsersModule,
    PassportModule,
    // JwtService mặc định ký access token; refresh token truyền secret riêng khi ký
    JwtModule.registerAsync({
      imports: [ConfigModule],
      useFactory: (configService: ConfigService) => {
        const secret = configService.get<string>('auth.jwt.accessSecret');
        if (!secret) {
          throw new Error('JWT_ACCESS_SECRET is required');
        }
        return {
          secret,
          signOptions: {
            expiresIn:
              configService.get<string>('auth.jwt.accessExpiresIn') || '15m',
          },
        };
      },
      inject: [ConfigService],
    }),
  ],
  controllers: [AuthController],
  providers: [AuthService, JwtStrategy],
  // Export PassportModule để module khác dùng được JwtAuthGuard
  exports: [AuthService, PassportModule],
})
export class AuthModule {}
