import {
  PipeTransform,
  Injectable,
  ArgumentMetadata,
  BadRequestException,
} from '@nestjs/common';
import { validate } from 'class-validator';
import { plainToInstance } from 'class-transformer';

type Constructor = new (...args: unknown[]) => unknown;

const PRIMITIVES: Constructor[] = [String, Boolean, Number, Array, Object];

@Injectable()
export class ValidationPipe implements PipeTransform<unknown> {
  async transform(value: unknown, { metatype }: ArgumentMetadata): Promise<unknown> {
    if (!metatype || !this.toValidate(metatype)) {
      return value;
    }

    const object: object = plainToInstance(metatype, value ?? {});
    const errors = await validate(object, {
      whitelist: true, // Strip properties that don't have decorators
      forbidNonWhitelisted: true, // Throw error if non-whitelisted properties are present
    });

    if (errors.length > 0) {
      const details: Record<string, string[]> = {};
      for (const error of errors) {
        details[error.property] = error.constraints ? Object.values(error.constraints) : [];
      }

      throw new BadRequestException({
        error: 'Bad Request',
        message: 'Validation failed',
        details,
      });
    }

    return object;
  }

  private toValidate(metatype: Constructor): boolean {
    return !PRIMITIVES.includes(metatype);
  }
}
