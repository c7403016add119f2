import { BadRequestException, Injectable, PipeTransform } from '@nestjs/common';
import { MAX_SERIAL_ID } from '../constants/database.constants';

/**
 * Parses a route parameter into a row id that fits a SERIAL column.
 */
@Injectable()
export class ParseIdPipe implements PipeTransform<string, number> {
  transform(value: string): number {
    const id = /^\d+$/.test(value) ? Number(value) : Number.NaN;

    if (!Number.isSafeInteger(id) || id < 1 || id > MAX_SERIAL_ID) {
      throw new BadRequestException('Validation failed (a positive id is expected)');
    }

    return id;
  }
}
