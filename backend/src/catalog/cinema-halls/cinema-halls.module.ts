// CinemaHallsModule - gom controller/service cho phòng chiếu
import { Module } from '@nestjs/common';
import { MongooseModule } from '@nestjs/mongoose';
import { CinemaHallsService } from './cinema-halls.service';
import { CinemaHallsController } from './cinema-halls.controller';
import { CinemaHall, CinemaHallSchema } from './schemas/cinema-hall.schema';
import { AuthModule } from '../../auth/auth.module';

@Module({
  imports: [
    AuthModule,
    MongooseModule.forFeature([
      { name: CinemaHall.name, schema: CinemaHallSchema },
    ]),
  ],
  controllers: [CinemaHallsController],
  providers: [CinemaHallsService],
  exports: [CinemaHallsService],
})
export class CinemaHallsModule {}
