// @CurrentUser() lấy caller (request.user) đã được JwtAuthGuard gán vào request
// Trả về null nếu request ẩn danh

import { createParamDecorator, ExecutionContext } from '@nestjs/common';
import type { AuthenticatedRequest, Caller } from '../interfaces/caller.interface';

export const CurrentUser = createParamDecorator(
  (_data: unknown, ctx: ExecutionContext): Caller | null => {
    const request = ctx.switchToHttp().getRequest<AuthenticatedRequest>();
    return request.user ?? null;
  },
);
