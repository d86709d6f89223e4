// AuthService xử lý đăng nhập, tạo cặp access/refresh token và refresh token

import { Injectable, Logger, UnauthorizedException } from '@nestjs/common';
import { JwtService } from '@nestjs/jwt';
import { ConfigService } from '@nestjs/config';
import * as bcrypt from 'bcrypt';
import { UsersService } from '../users/users.service';
import type { UserDocument } from '../users/schemas/user.schema';
import { LoginDto } from './dto/login.dto';
import type {
  AccessTokenPayload,
  RefreshTokenPayload,
} from './interfaces/jwt-payload.interface';

export interface TokenPair {
  access: string;
  refresh: string;
}

@Injectable()
export class AuthService {
  private readonly logger = new Logger(AuthService.name);

  constructor(
    private readonly usersService: UsersService,
    private readonly jwtService: JwtService, // đã cấu hình secret/expiresIn của access token trong AuthModule
    private readonly configService: ConfigService,
  ) {}

  /**
   * Kiểm tra email/password và cấp cặp token
   * Sai email, sai password hay user bị khoá đều trả cùng 1 lỗi (không lộ email nào tồn tại)
   */
  async obtainTokenPair(loginDto: LoginDto): Promise<TokenPair> {
    const user = await this.usersService.findByEmail(loginDto.email, true);

    if (!user || !user.isActive) {
      throw new UnauthorizedException('Invalid credentials');
    }

    // bcrypt.compare() tự hash password đầu vào rồi so với hash trong DB
    const isPasswordValid = await bcrypt.compare(
      loginDto.password,
      user.password,
    );

    if (!isPasswordValid) {
      throw new UnauthorizedException('Invalid credentials');
    }

    const tokens: TokenPair = {
      access: await this.signAccessToken(user),
      refresh: await this.signRefreshToken(user),
    };

    await this.usersService.updateLastLogin(user._id.toString());
    this.logger.log(`Issued token pair for user ${user._id.toString()}`);

    return tokens;
  }

  /**
   * Đổi refresh token lấy access token mới
   * Refresh token ký bằng secret riêng nên access token không thể dùng ở đây
   */
  async refreshAccessToken(refreshToken: string): Promise<{ access: string }> {
    let payload: RefreshTokenPayload;
    try {
      payload = await this.jwtService.verifyAsync<RefreshTokenPayload>(
        refreshToken,
        { secret: this.refreshSecret() },
      );
    } catch {
      throw new UnauthorizedException('Token is invalid or expired');
    }

    if (payload.type !== 'refresh') {
      throw new UnauthorizedException('Token is invalid or expired');
    }

    // User có thể đã bị khoá sau khi nhận refresh token
    const user = await this.usersService.findById(payload.sub);
    if (!user || !user.isActive) {
      throw new UnauthorizedException('User not found or inactive');
    }

    return { access: await this.signAccessToken(user) };
  }

  private signAccessToken(user: UserDocument): Promise<string> {
    const payload: AccessTokenPayload = {
      sub: user._id.toString(),
      email: user.email,
      isStaff: user.isStaff,
      type: 'access',
    };
    return this.jwtService.signAsync(payload);
  }

  private signRefreshToken(user: UserDocument): Promise<string> {
    const payload: RefreshTokenPayload = {
      sub: user._id.toString(),
      type: 'refresh',
    };
    return this.jwtService.signAsync(payload, {
      secret: this.refreshSecret(),
      expiresIn:
        this.configService.get<string>('auth.jwt.refreshExpiresIn') ?? '1d',
    });
  }

  private refreshSecret(): string {
    const secret = this.configService.get<string>('auth.jwt.refreshSecret');
    if (!secret) {
      throw new Error('JWT_REFRESH_SECRET is required');
    }
    return secret;
  }
}
