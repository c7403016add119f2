import { ValueObject } from '../../../../shared/domain/base/value-object.base';
import type { AvailabilityLevel } from '../../../../schedules/entities/schedule.entity';

interface SeatInventoryProps {
    readonly total: number;
    readonly available: number;
}

export class SeatInventory extends ValueObject<SeatInventoryProps> {
    private constructor(props: SeatInventoryProps) {
        super(props);
    }

    get isSoldOut(): boolean {
        return this.props.available === 0;
    }

    static create(total: number, available: number = total): SeatInventory {
        if (!Number.isInteger(total) || total <= 0) {
            throw new Error('Total seats must be a positive integer');
        }
        if (!Number.isInteger(available) || available < 0) {
            throw new Error('Available seats cannot be negative');
        }
        if (available > total) {
            throw new Error('Available seats cannot exceed total seats');
        }

        return new SeatInventory({ total, available });
    }

    /**
     * `limited` once the remaining share drops to `limitedPercent` of the train or below.
     */
    availabilityLevel(limitedPercent: number): AvailabilityLevel {
        if (this.isSoldOut) return 'sold_out';
        const remainingPercent = (this.props.available / this.props.total) * 100;
        return remainingPercent <= limitedPercent ? 'limited' : 'available';
    }

    protected equalsCore(other: SeatInventory): boolean {
        return this.props.total === other.props.total &&
            this.props.available === other.props.available;
    }
}
