// DTO tạo mới phòng chiếu
import { IsInt, IsNotEmpty, IsString, Max, MaxLength, Min } from 'class-validator';

export class CreateCinemaHallDto {
  @IsNotEmpty()
  @IsString()
  @MaxLength(255)
  name!: string;

  // Số hàng ghế
  @IsInt()
  @Min(1)
  @Max(100)
  rows!: number;

  // Số ghế mỗi hàng
  @IsInt()
  @Min(1)
  @Max(100)
  seatsInRow!: number;
}
