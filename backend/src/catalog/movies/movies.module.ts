// MoviesModule - gom controller/service cho phim
import { Module } from '@nestjs/common';
import { MongooseModule } from '@nestjs/mongoose';
import { MulterModule } from '@nestjs/platform-express';
import { MoviesService } from './movies.service';
import { MoviesController } from './movies.controller';
import { Movie, MovieSchema } from './schemas/movie.schema';
import { Genre, GenreSchema } from '../genres/schemas/genre.schema';
import { Actor, ActorSchema } from '../actors/schemas/actor.schema';
import { AuthModule } from '../../auth/auth.module';

// Poster tối đa 5MB
const MAX_IMAGE_SIZE = 5 * 1024 * 1024;

@Module({
  imports: [
    AuthModule,
    // Không khai báo storage → multer giữ file trong memory (file.buffer),
    // MoviesService tự ghi ra đĩa sau khi đã kiểm tra là ảnh
    MulterModule.register({
      limits: { fileSize: MAX_IMAGE_SIZE, files: 1 },
    }),
    // Genre/Actor cần để kiểm tra ID tham chiếu khi tạo phim
    MongooseModule.forFeature([
      { name: Movie.name, schema: MovieSchema },
      { name: Genre.name, schema: GenreSchema },
      { name: Actor.name, schema: ActorSchema },
    ]),
  ],
  controllers: [MoviesController],
  providers: [MoviesService],
  exports: [MoviesService],
})
export class MoviesModule {}
