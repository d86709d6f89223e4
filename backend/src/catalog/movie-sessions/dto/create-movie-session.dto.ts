// DTO tạo mới suất chiếu (cũng dùng cho PUT - thay toàn bộ)
import { IsDateString, IsMongoId, IsNotEmpty } from 'class-validator';

export class CreateMovieSessionDto {
  // Thời gian bắt đầu (ISO string, VD: "2026-06-02T14:00:00Z")
  @IsNotEmpty()
  @IsDateString()
  showTime!: string;

  @IsNotEmpty()
  @IsMongoId()
  movie!: string;

  @IsNotEmpty()
  @IsMongoId()
  cinemaHall!: string;
}
