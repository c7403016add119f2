/**
 * Read models for the timetable side of the application.
 * Dates are `YYYY-MM-DD` strings and times are `HH:MM` strings, formatted by the
 * database so no timezone conversion happens in the process.
 */
export interface Station {
  id: number;
  code: string;
  name: string;
}

export interface TrainSummary {
  id: number;
  number: string;
  name: string;
}

export interface CoachType {
  id: number;
  code: string;
  name: string;
  baseFareCents: number;
  fareMultiplier: number;
  description: string | null;
  /** Per-passenger fare after the multiplier is applied. */
  fareCents: number;
}

export type AvailabilityLevel = 'available' | 'limited' | 'sold_out';

export interface ScheduleDetails {
  id: number;
  train: TrainSummary;
  source: Station;
  destination: Station;
  travelDate: string;
  departureTime: string;
  arrivalTime: string;
  totalSeats: number;
  seatsAvailable: number;
}

export interface ScheduleAvailability extends ScheduleDetails {
  availability: AvailabilityLevel;
}

export interface ScheduleSearchCriteria {
  sourceStationId: number;
  destinationStationId: number;
  travelDate: string;
}

export interface ScheduleSearchResult {
  criteria: ScheduleSearchCriteria;
  source: Station;
  destination: Station;
  schedules: ScheduleAvailability[];
  coachTypes: CoachType[];
  lowestFareCents: number | null;
}
