import { Module } from '@nestjs/common';
import { DatabaseModule } from '../../database/database.module';
import { BOOKING_REPOSITORY } from './domain/repositories/booking.repository.interface';
import { BookingRepository } from './infrastructure/persistence/booking.repository';

@Module({
    imports: [DatabaseModule],
    providers: [
        {
            provide: BOOKING_REPOSITORY,
            useClass: BookingRepository,
        },
    ],
    exports: [BOOKING_REPOSITORY],
})
export class BookingDddModule { }
