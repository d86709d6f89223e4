// Movie Schema - thông tin phim
// genres/actors là mảng ObjectId tham chiếu sang collection genres/actors (many-to-many)

import { Prop, Schema, SchemaFactory } from '@nestjs/mongoose';
import { HydratedDocument, Types } from 'mongoose';

export type MovieDocument = HydratedDocument<Movie>;

@Schema({ collection: 'movies', timestamps: true })
export class Movie {
  @Prop({ required: true, trim: true, index: true })
  title!: string;

  @Prop({ required: true })
  description!: string;

  // Thời lượng phim (phút)
  @Prop({ required: true, min: 1 })
  duration!: number;

  @Prop({ type: [{ type: Types.ObjectId, ref: 'Genre' }], default: [] })
  genres!: Types.ObjectId[];

  @Prop({ type: [{ type: Types.ObjectId, ref: 'Actor' }], default: [] })
  actors!: Types.ObjectId[];

  // Đường dẫn tương đối trong MEDIA_ROOT (VD: "uploads/movies/the-ring-<uuid>.jpg")
  // Chỉ được set qua endpoint upload-image
  @Prop({ type: String, default: null })
  image!: string | null;
}

export const MovieSchema = SchemaFactory.createForClass(Movie);

// Lọc phim theo thể loại / diễn viên
MovieSchema.index({ genres: 1 });
MovieSchema.index({ actors: 1 });
