import { Type } from 'class-transformer';
import { IsInt, IsOptional, Min } from 'class-validator';

export class BookingFormQueryDto {
  @IsOptional()
  @Type(() => Number)
  @IsInt()
  @Min(1)
  count?: number;
}
