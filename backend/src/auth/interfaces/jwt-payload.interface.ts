// Payload nằm bên trong JWT
// type dùng để chặn việc dùng refresh token thay cho access token (và ngược lại)

export interface AccessTokenPayload {
  sub: string; // userId
  email: string;
  isStaff: boolean;
  type: 'access';
}

export interface RefreshTokenPayload {
  sub: string;
  type: 'refresh';
}
