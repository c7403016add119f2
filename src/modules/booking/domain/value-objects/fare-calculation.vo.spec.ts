import { FareCalculation } from './fare-calculation.vo';

describe('FareCalculation', () => {
  it('applies the coach multiplier to the base fare', () => {
    expect(FareCalculation.farePerPassenger(105_000, 1.35)).toBe(141_750);
    expect(FareCalculation.farePerPassenger(148_000, 1.7)).toBe(251_600);
  });

  it('rounds half a cent up', () => {
    // 333 * 1.5 = 499.5
    expect(FareCalculation.farePerPassenger(333, 1.5)).toBe(500);
  });

  it('multiplies the fare by the passenger count', () => {
    const fare = FareCalculation.calculate({ baseFareCents: 45_000, fareMultiplier: 1, passengerCount: 3 });

    expect(fare.farePerPassengerCents).toBe(45_000);
    expect(fare.totalCents).toBe(135_000);
  });

  it('needs at least one passenger', () => {
    expect(() => FareCalculation.calculate({ baseFareCents: 45_000, fareMultiplier: 1, passengerCount: 0 }))
      .toThrow('Passenger count must be a positive integer');
  });
});
