// AuthenticatedGuard: chỉ yêu cầu đã đăng nhập (không phân biệt staff)
// Dùng cho /user/me và đơn đặt vé - mỗi user tự quản lý dữ liệu của mình

import {
  CanActivate,
  ExecutionContext,
  Injectable,
  UnauthorizedException,
} from '@nestjs/common';
import type { AuthenticatedRequest } from '../interfaces/caller.interface';

@Injectable()
export class AuthenticatedGuard implements CanActivate {
  canActivate(context: ExecutionContext): boolean {
    const request = context.switchToHttp().getRequest<AuthenticatedRequest>();

    if (!request.user) {
      throw new UnauthorizedException(
        'Authentication credentials were not provided',
      );
    }

    return true;
  }
}
