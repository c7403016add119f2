import { TravelDate } from './travel-date.vo';

describe('TravelDate', () => {
  it('accepts an ISO calendar date', () => {
    expect(TravelDate.parse(' 2026-03-01 ').value).toBe('2026-03-01');
  });

  it('rejects other formats', () => {
    expect(() => TravelDate.parse('01/03/2026')).toThrow('Travel date must use the YYYY-MM-DD format');
  });

  it('rejects dates that do not exist', () => {
    expect(() => TravelDate.parse('2026-02-30')).toThrow('2026-02-30 is not a calendar date');
  });

  it('derives today from the given clock in UTC', () => {
    expect(TravelDate.today(new Date('2026-10-19T23:30:00.000Z')).value).toBe('2026-10-19');
  });

  it('adds days across a month boundary', () => {
    expect(TravelDate.parse('2026-01-31').addDays(1).value).toBe('2026-02-01');
  });
});
