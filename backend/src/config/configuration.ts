// Hàm này gom toàn bộ cấu hình từ biến môi trường (.env)
// thành một object duy nhất để dùng trong toàn bộ ứng dụng qua ConfigService.
export default () => ({
  // Môi trường chạy hiện tại của app: development | production | test
  nodeEnv: process.env.NODE_ENV ?? 'development',
  // Cổng mà NestJS sẽ lắng nghe, đọc từ PORT (string) và parse sang number
  port: parseInt(process.env.PORT ?? '3000', 10),
  database: {
    // URI kết nối MongoDB
    uri: process.env.MONGODB_URI ?? '',
  },
  auth: {
    jwt: {
      // Secret ký access token. Bắt buộc, env.validation sẽ chặn nếu thiếu
      accessSecret: process.env.JWT_ACCESS_SECRET ?? '',
      // Thời gian hết hạn của access token, VD: '15m' = 15 phút
      accessExpiresIn: process.env.JWT_ACCESS_EXPIRES ?? '15m',
      // Refresh token dùng secret riêng để không thể dùng lẫn với access token
      refreshSecret: process.env.JWT_REFRESH_SECRET ?? '',
      refreshExpiresIn: process.env.JWT_REFRESH_EXPIRES ?? '1d',
    },
  },
  cookies: {
    // Domain áp dụng cho cookie
    domain: process.env.COOKIE_DOMAIN ?? 'localhost',
    // Có bật cookie chỉ gửi qua HTTPS hay không (true khi chạy production với HTTPS)
    secure: (process.env.COOKIE_SECURE ?? 'false').toLowerCase() === 'true',
  },
  media: {
    // Thư mục lưu file upload (poster phim...)
    root: process.env.MEDIA_ROOT ?? './media',
    // Prefix URL public để client tải file đã upload
    url: process.env.MEDIA_URL ?? '/media/',
  },
});
