// JwtAuthGuard xác thực JWT nếu request có gửi token
// - Không có token → cho đi tiếp như request ẩn danh (request.user = undefined)
// - Có token → AuthGuard('jwt') gọi JwtStrategy.validate(), token sai/hết hạn → 401
// Việc ai được làm gì là trách nhiệm của guard chạy sau (AdminOrReadOnlyGuard, AuthenticatedGuard)

import { Injectable, ExecutionContext } from '@nestjs/common';
import { AuthGuard } from '@nestjs/passport';
import type { Request } from 'express';
import { extractAccessToken } from '../token-extractor';

@Injectable()
export class JwtAuthGuard extends AuthGuard('jwt') {
  canActivate(context: ExecutionContext) {
    const request = context.switchToHttp().getRequest<Request>();

    if (extractAccessToken(request) === null) {
      return true;
    }

    return super.canActivate(context);
  }
}
