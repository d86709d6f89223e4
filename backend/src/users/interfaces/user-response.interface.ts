// Dữ liệu user trả về cho client (không bao giờ có password)
export interface UserResponse {
  id: string;
  email: string;
  firstName: string;
  lastName: string;
  isStaff: boolean;
}
