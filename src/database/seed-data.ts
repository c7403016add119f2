export interface StationSeed {
  code: string;
  name: string;
}

export interface TrainSeed {
  number: string;
  name: string;
  sourceCode: string;
  destinationCode: string;
}

export interface CoachTypeSeed {
  code: string;
  name: string;
  baseFareCents: number;
  fareMultiplier: string;
  description: string;
}

export interface ScheduleSeed {
  trainNumber: string;
  /** Days after the provisioning date. */
  daysAhead: number;
  departureTime: string;
  arrivalTime: string;
  totalSeats: number;
}

export const SAMPLE_STATIONS: readonly StationSeed[] = [
  { code: 'NDLS', name: 'New Delhi' },
  { code: 'MMCT', name: 'Mumbai Central' },
  { code: 'BPL', name: 'Bhopal Junction' },
  { code: 'LKO', name: 'Lucknow' },
];

export const SAMPLE_TRAINS: readonly TrainSeed[] = [
  { number: '12001', name: 'New Delhi - Bhopal Shatabdi', sourceCode: 'NDLS', destinationCode: 'BPL' },
  { number: '12951', name: 'Mumbai - New Delhi Rajdhani', sourceCode: 'MMCT', destinationCode: 'NDLS' },
  { number: '12230', name: 'Lucknow Mail', sourceCode: 'LKO', destinationCode: 'NDLS' },
];

export const SAMPLE_COACH_TYPES: readonly CoachTypeSeed[] = [
  { code: 'SL', name: 'Sleeper', baseFareCents: 45000, fareMultiplier: '1.00', description: 'Sleeper Class' },
  { code: '3A', name: 'AC 3 Tier', baseFareCents: 105000, fareMultiplier: '1.35', description: 'AC 3 Tier' },
  { code: '2A', name: 'AC 2 Tier', baseFareCents: 148000, fareMultiplier: '1.70', description: 'AC 2 Tier' },
];

// Schedules run on the train's own route.
export const SAMPLE_SCHEDULES: readonly ScheduleSeed[] = [
  { trainNumber: '12001', daysAhead: 1, departureTime: '06:00', arrivalTime: '12:30', totalSeats: 120 },
  { trainNumber: '12951', daysAhead: 2, departureTime: '16:45', arrivalTime: '09:30', totalSeats: 90 },
  { trainNumber: '12230', daysAhead: 3, departureTime: '21:15', arrivalTime: '07:10', totalSeats: 110 },
];
