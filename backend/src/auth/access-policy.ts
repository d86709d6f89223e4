// AccessPolicy - quyết định request có được đi tiếp vào handler hay không
// Quy tắc: method "an toàn" (chỉ đọc) luôn được phép, còn lại chỉ staff mới được ghi

import type { Caller } from './interfaces/caller.interface';

// Các method không thay đổi dữ liệu phía server
export const SAFE_METHODS: ReadonlySet<string> = new Set([
  'GET',
  'HEAD',
  'OPTIONS',
]);

export function isSafeMethod(method: string): boolean {
  return SAFE_METHODS.has(method.toUpperCase());
}

/**
 * Hàm thuần (pure): cùng input luôn trả về cùng kết quả, không đọc/ghi state nào.
 * caller = null nghĩa là request ẩn danh (không có JWT).
 *
 * Khi trả về false, guard gọi hàm này tự phân biệt 401 (không có caller)
 * và 403 (có caller nhưng không phải staff).
 */
export function permit(method: string, caller: Caller | null): boolean {
  if (isSafeMethod(method)) {
    return true;
  }

  return caller !== null && caller.isStaff === true;
}
