import { ConflictException } from '@nestjs/common';

export class InsufficientSeatsException extends ConflictException {
  constructor(
    readonly requested: number,
    readonly seatsAvailable: number,
  ) {
    super(
      seatsAvailable === 0
        ? 'This train is sold out'
        : `Only ${seatsAvailable} seat(s) left, but ${requested} were requested`,
    );
  }
}
