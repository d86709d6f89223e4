// Query lọc danh sách phim
// VD: GET /api/cinema/movies?title=ring&genres=<id1>,<id2>&actors=<id3>
import { IsOptional, IsString } from 'class-validator';

export class MovieFilterDto {
  // Tìm theo tên phim, không phân biệt hoa thường, khớp một phần
  @IsOptional()
  @IsString()
  title?: string;

  // Danh sách ID thể loại, cách nhau bằng dấu phẩy
  @IsOptional()
  @IsString()
  genres?: string;

  @IsOptional()
  @IsString()
  actors?: string;
}
