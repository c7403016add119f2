import { BadRequestException } from '@nestjs/common';
import { CreateBookingDto } from '../../bookings/dto/create-booking.dto';
import { SearchSchedulesDto } from '../../schedules/dto/search-schedules.dto';
import { ValidationPipe } from './validation.pipe';

describe('ValidationPipe', () => {
  const pipe = new ValidationPipe();

  it('converts form strings into typed DTOs', async () => {
    const dto = await pipe.transform(
      { source: '1', destination: '3', date: '2026-10-20' },
      { type: 'body', metatype: SearchSchedulesDto },
    );

    expect(dto).toBeInstanceOf(SearchSchedulesDto);
    expect(dto).toEqual(Object.assign(new SearchSchedulesDto(), { source: 1, destination: 3, date: '2026-10-20' }));
  });

  it('turns single passenger fields into one-element lists', async () => {
    const dto = await pipe.transform(
      {
        scheduleId: '1',
        coachTypeId: '2',
        email: '',
        passengerName: ' Asha ',
        passengerAge: '34',
        seatPreference: 'window',
      },
      { type: 'body', metatype: CreateBookingDto },
    );

    expect(dto).toMatchObject({
      scheduleId: 1,
      coachTypeId: 2,
      passengerName: ['Asha'],
      passengerAge: [34],
      seatPreference: ['window'],
    });
  });

  it('keeps repeated passenger fields in order', async () => {
    const dto = await pipe.transform(
      {
        scheduleId: '1',
        coachTypeId: '1',
        passengerName: ['Asha', 'Ravi'],
        passengerAge: ['34', '36'],
        seatPreference: ['window', 'aisle'],
      },
      { type: 'body', metatype: CreateBookingDto },
    );

    expect(dto).toMatchObject({
      passengerName: ['Asha', 'Ravi'],
      passengerAge: [34, 36],
      seatPreference: ['window', 'aisle'],
    });
  });

  it('refuses ids that do not fit an integer column', async () => {
    const attempt = pipe.transform(
      {
        scheduleId: '99999999999',
        coachTypeId: '2147483648',
        passengerName: ['Asha'],
        passengerAge: ['34'],
        seatPreference: ['window'],
      },
      { type: 'body', metatype: CreateBookingDto },
    );

    await expect(attempt).rejects.toThrow(BadRequestException);
    await attempt.catch((error: BadRequestException) => {
      expect(error.getResponse()).toMatchObject({
        details: {
          scheduleId: ['scheduleId must not be greater than 2147483647'],
          coachTypeId: ['Choose a coach class'],
        },
      });
    });
  });

  it('accepts the largest integer id', async () => {
    const dto = await pipe.transform(
      { source: '2147483647', destination: '1', date: '2026-10-20' },
      { type: 'body', metatype: SearchSchedulesDto },
    );

    expect(dto).toMatchObject({ source: 2_147_483_647, destination: 1 });
  });

  it('refuses an out of range station id in a search', async () => {
    await expect(
      pipe.transform(
        { source: '1', destination: '2147483648', date: '2026-10-20' },
        { type: 'body', metatype: SearchSchedulesDto },
      ),
    ).rejects.toThrow(BadRequestException);
  });

  it('reports invalid fields by name', async () => {
    const attempt = pipe.transform(
      {
        scheduleId: '1',
        coachTypeId: '1',
        passengerName: ['Asha'],
        passengerAge: ['121'],
        seatPreference: ['roof'],
      },
      { type: 'body', metatype: CreateBookingDto },
    );

    await expect(attempt).rejects.toThrow(BadRequestException);
    await attempt.catch((error: BadRequestException) => {
      expect(error.getResponse()).toEqual({
        error: 'Bad Request',
        message: 'Validation failed',
        details: {
          passengerAge: ['Passenger ages must be between 0 and 120'],
          seatPreference: ['Unknown seat preference'],
        },
      });
    });
  });

  it('rejects fields the DTO does not declare', async () => {
    await expect(
      pipe.transform(
        { source: '1', destination: '3', date: '2026-10-20', admin: 'true' },
        { type: 'body', metatype: SearchSchedulesDto },
      ),
    ).rejects.toThrow(BadRequestException);
  });

  it('passes primitives through untouched', async () => {
    await expect(pipe.transform('42', { type: 'param', metatype: Number })).resolves.toBe('42');
  });
});
