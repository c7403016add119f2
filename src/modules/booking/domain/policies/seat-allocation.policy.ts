/**
 * Domain Policy: Seat Allocation
 * Seats are numbered from the top of the remaining inventory downwards, so a train
 * with 120 free seats hands out S120, S119, ... to the next booking.
 */
export class SeatAllocationPolicy {
    static assignSeatNumbers(seatsAvailableBefore: number, passengerCount: number): string[] {
        if (passengerCount > seatsAvailableBefore) {
            throw new Error(`Cannot assign ${passengerCount} seats from ${seatsAvailableBefore} available`);
        }

        return Array.from({ length: passengerCount }, (_, index) =>
            `S${(seatsAvailableBefore - index).toString().padStart(3, '0')}`,
        );
    }

    static validatePassengerCount(
        passengerCount: number,
        maxPerBooking: number,
    ): { valid: boolean; error?: string } {
        if (passengerCount < 1) {
            return { valid: false, error: 'At least one passenger is required' };
        }
        if (passengerCount > maxPerBooking) {
            return { valid: false, error: `A booking can hold at most ${maxPerBooking} passengers` };
        }
        return { valid: true };
    }
}
