// File main.ts là entrypoint của ứng dụng NestJS.

import 'reflect-metadata';
import { NestFactory } from '@nestjs/core';
import { Logger, ValidationPipe } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import type { NestExpressApplication } from '@nestjs/platform-express';
import helmet from 'helmet';
import cookieParser from 'cookie-parser';
import { AppModule } from './app.module';
import { MediaStorageService } from './media/media-storage.service';

// Logger dùng để log quá trình khởi động
const logger = new Logger('Bootstrap');

async function bootstrap() {
  const app = await NestFactory.create<NestExpressApplication>(AppModule);

  // Helmet thêm các HTTP header bảo mật
  // crossOriginResourcePolicy: cho phép frontend khác origin hiển thị poster phim
  app.use(helmet({ crossOriginResourcePolicy: { policy: 'cross-origin' } }));

  // cookie-parser để JwtStrategy đọc được cookie access_token
  app.use(cookieParser());

  // Mọi route nằm dưới /api (VD: /api/cinema/movies, /api/token)
  app.setGlobalPrefix('api');

  // Global ValidationPipe:
  // - validate DTO theo class-validator
  // - loại bỏ field thừa không khai báo trong DTO (whitelist)
  // - tự convert kiểu dữ liệu (string -> number, v.v.)
  app.useGlobalPipes(
    new ValidationPipe({
      whitelist: true,
      transform: true,
      transformOptions: {
        enableImplicitConversion: true,
      },
    }),
  );

  // Phục vụ file upload (poster phim) dưới MEDIA_URL
  const media = app.get(MediaStorageService);
  app.useStaticAssets(media.root, { prefix: media.baseUrl });

  const configService = app.get(ConfigService);
  const port = configService.get<number>('port') ?? 3000;

  await app.listen(port);
  logger.log(`Cinema API listening on port ${port}`);
}

// Gọi hàm bootstrap và bắt lỗi nếu có (VD: kết nối DB thất bại)
bootstrap().catch((error) => {
  logger.error('Failed to bootstrap application', error);
  process.exit(1);
});
