// MovieSession Schema - suất chiếu: phim nào, phòng nào, giờ chiếu
import { Prop, Schema, SchemaFactory } from '@nestjs/mongoose';
import { HydratedDocument, Types } from 'mongoose';

export type MovieSessionDocument = HydratedDocument<MovieSession>;

@Schema({ collection: 'movieSessions', timestamps: true })
export class MovieSession {
  // Thời gian bắt đầu suất chiếu (lưu UTC)
  @Prop({ type: Date, required: true, index: true })
  showTime!: Date;

  @Prop({ type: Types.ObjectId, ref: 'Movie', required: true, index: true })
  movie!: Types.ObjectId;

  @Prop({ type: Types.ObjectId, ref: 'CinemaHall', required: true })
  cinemaHall!: Types.ObjectId;
}

export const MovieSessionSchema = SchemaFactory.createForClass(MovieSession);
