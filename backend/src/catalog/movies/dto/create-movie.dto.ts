// DTO tạo mới Movie
// Không có field image: ảnh chỉ upload qua POST /movies/:id/upload-image,
// field image gửi kèm ở đây sẽ bị ValidationPipe (whitelist) loại bỏ
import {
  ArrayUnique,
  IsArray,
  IsInt,
  IsMongoId,
  IsNotEmpty,
  IsString,
  MaxLength,
  Min,
} from 'class-validator';

export class CreateMovieDto {
  @IsNotEmpty()
  @IsString()
  @MaxLength(255)
  title!: string;

  @IsNotEmpty()
  @IsString()
  description!: string;

  // Thời lượng phút
  @IsInt()
  @Min(1)
  duration!: number;

  @IsArray()
  @ArrayUnique()
  @IsMongoId({ each: true })
  genres: string[] = [];

  @IsArray()
  @ArrayUnique()
  @IsMongoId({ each: true })
  actors: string[] = [];
}
