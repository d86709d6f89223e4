import { IsNotEmpty, IsString, MaxLength } from 'class-validator';

export class CreateActorDto {
  @IsNotEmpty()
  @IsString()
  @MaxLength(255)
  firstName!: string;

  @IsNotEmpty()
  @IsString()
  @MaxLength(255)
  lastName!: string;
}
