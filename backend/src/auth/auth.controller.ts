// AuthController cấp và làm mới JWT
// base path = "/api/token" (prefix "api" set trong main.ts)

import {
  Controller,
  Post,
  Body,
  Res,
  HttpCode,
  HttpStatus,
} from '@nestjs/common';
import type { CookieOptions, Response } from 'express';
import { ConfigService } from '@nestjs/config';
import { AuthService, TokenPair } from './auth.service';
import { LoginDto } from './dto/login.dto';
import { RefreshTokenDto } from './dto/refresh-token.dto';
import { ACCESS_TOKEN_COOKIE } from './token-extractor';

@Controller('token')
export class AuthController {
  constructor(
    private readonly authService: AuthService,
    private readonly configService: ConfigService,
  ) {}

  /**
   * POST /api/token
   * Đăng nhập bằng email + password
   * @returns { access, refresh } - access token đồng thời được set vào HTTP-only cookie
   */
  @Post()
  @HttpCode(HttpStatus.OK)
  async obtain(
    @Body() loginDto: LoginDto,
    @Res({ passthrough: true }) res: Response,
  ): Promise<TokenPair> {
    // passthrough: true = vẫn để Nest serialize giá trị return thành JSON
    const tokens = await this.authService.obtainTokenPair(loginDto);

    // Không set maxAge: cookie sống theo phiên trình duyệt, hạn thật nằm trong claim exp của JWT
    res.cookie(ACCESS_TOKEN_COOKIE, tokens.access, this.cookieOptions());

    return tokens;
  }

  /**
   * POST /api/token/refresh
   * Body: { refresh } → { access }
   */
  @Post('refresh')
  @HttpCode(HttpStatus.OK)
  async refresh(
    @Body() dto: RefreshTokenDto,
    @Res({ passthrough: true }) res: Response,
  ) {
    const result = await this.authService.refreshAccessToken(dto.refresh);
    res.cookie(ACCESS_TOKEN_COOKIE, result.access, this.cookieOptions());
    return result;
  }

  /**
   * POST /api/token/logout
   * Xoá cookie access_token (token đã cấp vẫn có hiệu lực tới khi hết hạn)
   */
  @Post('logout')
  @HttpCode(HttpStatus.OK)
  logout(@Res({ passthrough: true }) res: Response) {
    res.clearCookie(ACCESS_TOKEN_COOKIE, this.cookieOptions());

    return {
      message: 'Logout successful',
    };
  }

  private cookieOptions(): CookieOptions {
    return {
      httpOnly: true, // JavaScript phía client không đọc được cookie này
      secure: this.configService.get<boolean>('cookies.secure'), // true = chỉ gửi qua HTTPS
      sameSite: 'strict',
      domain: this.configService.get<string>('cookies.domain'),
    };
  }
}
