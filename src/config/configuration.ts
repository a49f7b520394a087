// Hàm này gom toàn bộ cấu hình từ biến môi trường (.env)
// thành một object duy nhất để dùng trong toàn bộ ứng dụng qua ConfigService.
export default () => ({
  // Môi trường chạy hiện tại của app: development | production | test
  nodeEnv: process.env.NODE_ENV ?? 'development',
  // Cổng mà NestJS sẽ lắng nghe, đọc từ PORT (string) và parse sang number
  port: parseInt(process.env.PORT ?? '3000', 10),
  database: {
    // URI kết nối đến MongoDB (database của catalog rạp phim)
    uri: process.env.MONGODB_URI ?? '',
  },
  auth: {
    jwt: {
      // Secret dùng để ký JWT, bắt buộc có trong .env (env.validation.ts đã kiểm tra)
      accessSecret: process.env.JWT_ACCESS_SECRET ?? '',
      // Thời gian hết hạn của access token, VD: '15m' = 15 phút
      accessExpiresIn: process.env.JWT_ACCESS_EXPIRES ?? '15m',
    },
  },
  cookies: {
    // Domain áp dụng cho cookie (frontend sẽ truy cập qua domain này)
    domain: process.env.COOKIE_DOMAIN ?? 'localhost',
    // Có bật cookie chỉ gửi qua HTTPS hay không (true khi chạy production với HTTPS)
    secure: (process.env.COOKIE_SECURE ?? 'false').toLowerCase() === 'true',
  },
  media: {
    // Thư mục gốc lưu file upload (poster phim...)
    root: process.env.MEDIA_ROOT ?? './media',
    // Prefix URL để client tải file, có thể là URL tuyệt đối của CDN
    url: process.env.MEDIA_URL ?? '/media/',
  },
});
