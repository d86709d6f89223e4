// Escape ký tự đặc biệt để dùng chuỗi của user trong $regex an toàn
export function escapeRegex(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}
