import { Transform, Type } from 'class-transformer';
import {
  ArrayMaxSize,
  ArrayMinSize,
  IsArray,
  IsEmail,
  IsIn,
  IsInt,
  IsOptional,
  IsString,
  Length,
  Max,
  Min,
} from 'class-validator';
import { MAX_SERIAL_ID } from '../../common/constants/database.constants';
import { SEAT_PREFERENCES, SeatPreference } from '../entities/booking.entity';

/** Form posts send a single value as a string and repeated values as an array. */
function toArray(value: unknown): unknown {
  if (value === undefined || value === null) return [];
  return Array.isArray(value) ? value : [value];
}

function toTrimmedStrings(value: unknown): unknown {
  const items = toArray(value);
  return Array.isArray(items)
    ? items.map(item => (typeof item === 'string' ? item.trim() : item))
    : items;
}

function toIntegers(value: unknown): unknown {
  const items = toArray(value);
  return Array.isArray(items)
    ? items.map(item => (typeof item === 'string' && item.trim() !== '' ? Number(item) : Number.NaN))
    : items;
}

export class CreateBookingDto {
  @Type(() => Number)
  @IsInt()
  @Min(1)
  @Max(MAX_SERIAL_ID)
  scheduleId!: number;

  @Type(() => Number)
  @IsInt({ message: 'Choose a coach class' })
  @Min(1, { message: 'Choose a coach class' })
  @Max(MAX_SERIAL_ID, { message: 'Choose a coach class' })
  coachTypeId!: number;

  @Transform(({ value }) => (typeof value === 'string' && value.trim() === '' ? undefined : value))
  @IsOptional()
  @IsEmail({}, { message: 'email must be a valid address' })
  email?: string;

  @Transform(({ value }) => toTrimmedStrings(value))
  @IsArray()
  @ArrayMinSize(1, { message: 'At least one passenger is required' })
  @ArrayMaxSize(20)
  @IsString({ each: true })
  @Length(1, 100, { each: true, message: 'Passenger names must be 1 to 100 characters long' })
  passengerName!: string[];

  @Transform(({ value }) => toIntegers(value))
  @IsArray()
  @IsInt({ each: true, message: 'Passenger ages must be whole numbers' })
  @Min(0, { each: true, message: 'Passenger ages must be between 0 and 120' })
  @Max(120, { each: true, message: 'Passenger ages must be between 0 and 120' })
  passengerAge!: number[];

  @Transform(({ value }) => toTrimmedStrings(value))
  @IsArray()
  @IsIn(SEAT_PREFERENCES, { each: true, message: 'Unknown seat preference' })
  seatPreference!: SeatPreference[];
}
