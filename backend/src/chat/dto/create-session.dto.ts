import { IsNotEmpty, IsOptional, IsString, MaxLength } from 'class-validator';

export class CreateSessionDto {
  @IsString()
  @IsNotEmpty()
  booking_id!: string;

  @IsOptional()
  @IsString()
  @MaxLength(16)
  language?: string;
}
