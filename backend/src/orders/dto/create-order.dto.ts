// DTO tạo order: { tickets: [{ row, seat, movieSession }] }
import { Type } from 'class-transformer';
import {
  ArrayMaxSize,
  ArrayMinSize,
  IsArray,
  IsInt,
  IsMongoId,
  Min,
  ValidateNested,
} from 'class-validator';

export class CreateTicketDto {
  @IsInt()
  @Min(1)
  row!: number;

  @IsInt()
  @Min(1)
  seat!: number;

  @IsMongoId()
  movieSession!: string;
}

export class CreateOrderDto {
  // @Type() để class-transformer tạo instance CreateTicketDto → ValidateNested mới chạy được
  @IsArray()
  @ArrayMinSize(1)
  @ArrayMaxSize(50)
  @ValidateNested({ each: true })
  @Type(() => CreateTicketDto)
  tickets!: CreateTicketDto[];
}
