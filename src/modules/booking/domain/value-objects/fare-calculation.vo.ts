import { ValueObject } from '../../../../shared/domain/base/value-object.base';

interface FareCalculationProps {
    readonly farePerPassengerCents: number;
    readonly passengerCount: number;
    readonly totalCents: number;
}

export class FareCalculation extends ValueObject<FareCalculationProps> {
    private constructor(props: FareCalculationProps) {
        super(props);
    }

    get farePerPassengerCents(): number { return this.props.farePerPassengerCents; }
    get totalCents(): number { return this.props.totalCents; }

    /**
     * Base fare times the coach multiplier, rounded half-up to the cent.
     * The multiplier is taken to two decimals, as stored.
     */
    static farePerPassenger(baseFareCents: number, fareMultiplier: number): number {
        if (baseFareCents < 0) {
            throw new Error('Base fare cannot be negative');
        }
        if (fareMultiplier <= 0) {
            throw new Error('Fare multiplier must be positive');
        }
        const multiplierHundredths = Math.round(fareMultiplier * 100);
        return Math.floor((baseFareCents * multiplierHundredths + 50) / 100);
    }

    static calculate(params: {
        baseFareCents: number;
        fareMultiplier: number;
        passengerCount: number;
    }): FareCalculation {
        if (!Number.isInteger(params.passengerCount) || params.passengerCount <= 0) {
            throw new Error('Passenger count must be a positive integer');
        }

        const farePerPassengerCents = FareCalculation.farePerPassenger(params.baseFareCents, params.fareMultiplier);

        return new FareCalculation({
            farePerPassengerCents,
            passengerCount: params.passengerCount,
            totalCents: farePerPassengerCents * params.passengerCount,
        });
    }

    protected equalsCore(other: FareCalculation): boolean {
        return this.props.totalCents === other.props.totalCents &&
            this.props.passengerCount === other.props.passengerCount;
    }
}
