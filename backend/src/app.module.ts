// AppModule là root module của ứng dụng NestJS.
// Ở đây cấu hình các module toàn cục: Config, Mongoose, Media và import các module nghiệp vụ

import { Module } from '@nestjs/common';
import { ConfigModule, ConfigService } from '@nestjs/config';
import { MongooseModule } from '@nestjs/mongoose';
import configuration from './config/configuration';
import { validate } from './config/env.validation';
import { MediaModule } from './media/media.module';
import { UsersModule } from './users/users.module';
import { AuthModule } from './auth/auth.module';
import { GenresModule } from './catalog/genres/genres.module';
import { ActorsModule } from './catalog/actors/actors.module';
import { CinemaHallsModule } from './catalog/cinema-halls/cinema-halls.module';
import { MoviesModule } from './catalog/movies/movies.module';
import { MovieSessionsModule } from './catalog/movie-sessions/movie-sessions.module';
import { OrdersModule } from './orders/orders.module';

@Module({
  imports: [
    // ConfigModule đọc biến môi trường (.env) và cho phép inject ConfigService ở mọi nơi
    ConfigModule.forRoot({
      isGlobal: true,
      load: [configuration],
      validate, // kiểm tra .env hợp lệ trước khi chạy app
    }),
    MongooseModule.forRootAsync({
      useFactory: (configService: ConfigService) => ({
        uri: configService.get<string>('database.uri'),
      }),
      inject: [ConfigService],
    }),
    MediaModule,
    // Import các module nghiệp vụ
    UsersModule,
    AuthModule,
    GenresModule,
    ActorsModule,
    CinemaHallsModule,
    MoviesModule,
    MovieSessionsModule,
    OrdersModule,
  ],
})
export class AppModule {}
