// AdminOrReadOnlyGuard bọc AccessPolicy cho pipeline của Nest
// Guard này chạy SAU JwtAuthGuard (request.user đã được resolve nếu có token)
//   - permit() = true  → vào handler
//   - không có user    → 401 Unauthorized
//   - có user, không phải staff → 403 Forbidden

import {
  CanActivate,
  ExecutionContext,
  ForbiddenException,
  Injectable,
  Logger,
  UnauthorizedException,
} from '@nestjs/common';
import { permit } from '../access-policy';
import type { AuthenticatedRequest } from '../interfaces/caller.interface';

@Injectable()
export class AdminOrReadOnlyGuard implements CanActivate {
  private readonly logger = new Logger(AdminOrReadOnlyGuard.name);

  canActivate(context: ExecutionContext): boolean {
    const request = context.switchToHttp().getRequest<AuthenticatedRequest>();
    const caller = request.user ?? null;

    if (permit(request.method, caller)) {
      return true;
    }

    if (caller === null) {
      throw new UnauthorizedException(
        'Authentication credentials were not provided',
      );
    }

    this.logger.warn(
      `Denied ${request.method} ${request.originalUrl} for non-staff user ${caller.userId}`,
    );
    throw new ForbiddenException(
      'You do not have permission to perform this action',
    );
  }
}
