import { Type } from 'class-transformer';
import { IsInt, IsString, Matches, Max, Min } from 'class-validator';
import { MAX_SERIAL_ID } from '../../common/constants/database.constants';

export class SearchSchedulesDto {
  @Type(() => Number)
  @IsInt({ message: 'Choose a source station' })
  @Min(1, { message: 'Choose a source station' })
  @Max(MAX_SERIAL_ID, { message: 'Choose a source station' })
  source!: number;

  @Type(() => Number)
  @IsInt({ message: 'Choose a destination station' })
  @Min(1, { message: 'Choose a destination station' })
  @Max(MAX_SERIAL_ID, { message: 'Choose a destination station' })
  destination!: number;

  @IsString()
  @Matches(/^\d{4}-\d{2}-\d{2}$/, { message: 'date must use the YYYY-MM-DD format' })
  date!: string;
}
