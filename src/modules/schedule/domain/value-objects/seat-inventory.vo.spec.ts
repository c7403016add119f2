import { SeatInventory } from './seat-inventory.vo';

describe('SeatInventory', () => {
  it('starts fully available when only the total is given', () => {
    const inventory = SeatInventory.create(50);

    expect(inventory.equals(SeatInventory.create(50, 50))).toBe(true);
    expect(inventory.isSoldOut).toBe(false);
  });

  it('refuses counts outside 0..total', () => {
    expect(() => SeatInventory.create(50, 51)).toThrow('Available seats cannot exceed total seats');
    expect(() => SeatInventory.create(50, -1)).toThrow('Available seats cannot be negative');
    expect(() => SeatInventory.create(0)).toThrow('Total seats must be a positive integer');
  });

  it('is sold out once nothing is left', () => {
    expect(SeatInventory.create(50, 0).isSoldOut).toBe(true);
  });

  it('labels availability by the remaining share', () => {
    expect(SeatInventory.create(100, 50).availabilityLevel(10)).toBe('available');
    expect(SeatInventory.create(100, 10).availabilityLevel(10)).toBe('limited');
    expect(SeatInventory.create(100, 0).availabilityLevel(10)).toBe('sold_out');
  });

  it('compares by value', () => {
    expect(SeatInventory.create(10, 4).equals(SeatInventory.create(10, 4))).toBe(true);
    expect(SeatInventory.create(10, 4).equals(SeatInventory.create(10, 5))).toBe(false);
  });
});
