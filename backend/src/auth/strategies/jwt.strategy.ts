// JwtStrategy là Passport strategy để xác thực access token
// Token lấy từ header Authorization hoặc cookie access_token (xem token-extractor.ts)

import { Injectable, UnauthorizedException } from '@nestjs/common';
import { PassportStrategy } from '@nestjs/passport';
import { Strategy } from 'passport-jwt';
import { ConfigService } from '@nestjs/config';
import { UsersService } from '../../users/users.service';
import { extractAccessToken } from '../token-extractor';
import type { AccessTokenPayload } from '../interfaces/jwt-payload.interface';
import type { Caller } from '../interfaces/caller.interface';

@Injectable()
export class JwtStrategy extends PassportStrategy(Strategy) {
  constructor(
    configService: ConfigService,
    private readonly usersService: UsersService,
  ) {
    const secret = configService.get<string>('auth.jwt.accessSecret');
    if (!secret) {
      throw new Error('JWT_ACCESS_SECRET is required');
    }
    super({
      jwtFromRequest: extractAccessToken,
      // secretOrKey phải match với secret khi tạo token (AuthModule)
      secretOrKey: secret,
      ignoreExpiration: false,
    });
  }

  /**
   * Passport gọi hàm này sau khi verify chữ ký + hạn của JWT thành công
   * @returns Caller - sẽ có trong request.user
   */
  async validate(payload: AccessTokenPayload): Promise<Caller> {
    if (payload.type !== 'access') {
      throw new UnauthorizedException('Token is not an access token');
    }

    // Đọc lại user từ DB: quyền staff luôn lấy theo DB, không tin payload
    const user = await this.usersService.findById(payload.sub);

    if (!user || !user.isActive) {
      throw new UnauthorizedException('User not found or inactive');
    }

    return {
      userId: user._id.toString(),
      email: user.email,
      isStaff: user.isStaff,
    };
  }
}
