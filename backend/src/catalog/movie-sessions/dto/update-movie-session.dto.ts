// DTO cập nhật suất chiếu (PATCH) - tất cả field tuỳ chọn
import { IsDateString, IsMongoId, IsOptional } from 'class-validator';

export class UpdateMovieSessionDto {
  @IsOptional()
  @IsDateString()
  showTime?: string;

  @IsOptional()
  @IsMongoId()
  movie?: string;

  @IsOptional()
  @IsMongoId()
  cinemaHall?: string;
}
