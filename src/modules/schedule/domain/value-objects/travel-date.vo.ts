import { ValueObject } from '../../../../shared/domain/base/value-object.base';

interface TravelDateProps {
    readonly value: string;
}

const ISO_DATE = /^(\d{4})-(\d{2})-(\d{2})$/;

/**
 * Calendar date of a journey, kept as `YYYY-MM-DD` in UTC.
 */
export class TravelDate extends ValueObject<TravelDateProps> {
    private constructor(props: TravelDateProps) {
        super(props);
    }

    get value(): string {
        return this.props.value;
    }

    static parse(raw: string): TravelDate {
        const match = ISO_DATE.exec(raw.trim());
        if (!match) {
            throw new Error('Travel date must use the YYYY-MM-DD format');
        }

        const [, year, month, day] = match;
        const date = new Date(Date.UTC(Number(year), Number(month) - 1, Number(day)));

        // Date.UTC rolls 2025-02-30 over into March
        if (date.getUTCFullYear() !== Number(year) ||
            date.getUTCMonth() !== Number(month) - 1 ||
            date.getUTCDate() !== Number(day)) {
            throw new Error(`${raw} is not a calendar date`);
        }

        return new TravelDate({ value: date.toISOString().slice(0, 10) });
    }

    static today(now: Date = new Date()): TravelDate {
        return new TravelDate({ value: now.toISOString().slice(0, 10) });
    }

    addDays(days: number): TravelDate {
        const date = new Date(`${this.props.value}T00:00:00.000Z`);
        date.setUTCDate(date.getUTCDate() + days);
        return new TravelDate({ value: date.toISOString().slice(0, 10) });
    }

    protected equalsCore(other: TravelDate): boolean {
        return this.props.value === other.props.value;
    }
}
