// OrdersModule quản lý đơn đặt vé (orders + tickets)
import { Module } from '@nestjs/common';
import { MongooseModule } from '@nestjs/mongoose';
import { OrdersService } from './orders.service';
import { OrdersController } from './orders.controller';
import { SeatOccupancyService } from './seat-occupancy.service';
import { Order, OrderSchema } from './schemas/order.schema';
import {
  MovieSession,
  MovieSessionSchema,
} from '../catalog/movie-sessions/schemas/movie-session.schema';
import {
  CinemaHall,
  CinemaHallSchema,
} from '../catalog/cinema-halls/schemas/cinema-hall.schema';
import { Movie, MovieSchema } from '../catalog/movies/schemas/movie.schema';
import { AuthModule } from '../auth/auth.module';

@Module({
  imports: [
    AuthModule,
    // Đăng ký các schema liên quan (populate suất chiếu → phim, phòng chiếu)
    MongooseModule.forFeature([
      { name: Order.name, schema: OrderSchema },
      { name: MovieSession.name, schema: MovieSessionSchema },
      { name: CinemaHall.name, schema: CinemaHallSchema },
      { name: Movie.name, schema: MovieSchema },
    ]),
  ],
  controllers: [OrdersController],
  providers: [OrdersService, SeatOccupancyService],
})
export class OrdersModule {}
