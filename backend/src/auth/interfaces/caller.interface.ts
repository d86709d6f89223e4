// Caller - thông tin người gọi API sau khi JwtStrategy xác thực xong
// Object này được gán vào request.user

import type { Request } from 'express';

export interface Caller {
  userId: string;
  email: string;
  // true = staff/admin, được phép ghi dữ liệu catalog
  isStaff: boolean;
}

// Request đã đi qua JwtAuthGuard: user có thể không tồn tại (request ẩn danh)
export type AuthenticatedRequest = Request & { user?: Caller };
