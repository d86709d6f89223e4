// MovieSessionsModule - gom controller/service cho suất chiếu
import { Module } from '@nestjs/common';
import { MongooseModule } from '@nestjs/mongoose';
import { MovieSessionsService } from './movie-sessions.service';
import { MovieSessionsController } from './movie-sessions.controller';
import {
  MovieSession,
  MovieSessionSchema,
} from './schemas/movie-session.schema';
import { Movie, MovieSchema } from '../movies/schemas/movie.schema';
import {
  CinemaHall,
  CinemaHallSchema,
} from '../cinema-halls/schemas/cinema-hall.schema';
import { Order, OrderSchema } from '../../orders/schemas/order.schema';
import { SeatOccupancyService } from '../../orders/seat-occupancy.service';
import { AuthModule } from '../../auth/auth.module';

@Module({
  imports: [
    AuthModule,
    MongooseModule.forFeature([
      { name: MovieSession.name, schema: MovieSessionSchema },
      { name: Movie.name, schema: MovieSchema },
      { name: CinemaHall.name, schema: CinemaHallSchema },
      // Order để đếm ghế đã bán
      { name: Order.name, schema: OrderSchema },
    ]),
  ],
  controllers: [MovieSessionsController],
  providers: [MovieSessionsService, SeatOccupancyService],
  exports: [MovieSessionsService],
})
export class MovieSessionsModule {}
