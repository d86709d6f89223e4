// Query lọc suất chiếu: ?date=2026-06-02&movie=<movieId>
import { IsMongoId, IsOptional, Matches } from 'class-validator';

export class MovieSessionFilterDto {
  // Ngày chiếu theo UTC, định dạng YYYY-MM-DD
  @IsOptional()
  @Matches(/^\d{4}-\d{2}-\d{2}$/, { message: 'date must be in YYYY-MM-DD format' })
  date?: string;

  @IsOptional()
  @IsMongoId()
  movie?: string;
}
