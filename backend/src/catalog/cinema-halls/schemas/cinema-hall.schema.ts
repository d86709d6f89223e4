// CinemaHall Schema - phòng chiếu
// Phòng có rows hàng ghế, mỗi hàng seatsInRow ghế → sức chứa = rows * seatsInRow
import { Prop, Schema, SchemaFactory } from '@nestjs/mongoose';
import { HydratedDocument } from 'mongoose';

export type CinemaHallDocument = HydratedDocument<CinemaHall>;

@Schema({ collection: 'cinemaHalls', timestamps: false })
export class CinemaHall {
  // Tên phòng (Blue, IMAX 01...)
  @Prop({ required: true, trim: true })
  name!: string;

  @Prop({ required: true, min: 1 })
  rows!: number;

  @Prop({ required: true, min: 1 })
  seatsInRow!: number;
}

export const CinemaHallSchema = SchemaFactory.createForClass(CinemaHall);

export function hallCapacity(hall: Pick<CinemaHall, 'rows' | 'seatsInRow'>) {
  return hall.rows * hall.seatsInRow;
}
