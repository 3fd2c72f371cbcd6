import logger from '../config/logger';
import { FareBracket, FareTable } from '../types/service';
import { PassengerAge } from '../types/session';
import { AppError } from '../utils/AppError';
import { FarePredictor, TripContext } from './farePredictor.client';

export const DEFAULT_DISTANCE_KM = 5.0;
export const DEFAULT_TRAFFIC_LEVEL = 1;
export const BASE_FARE_PER_PASSENGER = 20.0;
export const PER_KM_RATE = 5.0;
export const MINIMUM_FARE = 5.0;
export const CHILD_MAX_AGE = 12;

export function roundFare(value: number): number {
  return Math.round(value * 100) / 100;
}

function finiteOr(value: number | undefined, fallback: number): number {
  return value !== undefined && Number.isFinite(value) ? value : fallback;
}

/**
 * Local fare formula used for timetable offers:
 * max(5, round((20 * passengers + km * 5) * (1 + 0.1 * traffic), 2))
 */
export function localFareEstimate(context: TripContext): number {
  const passengers = Math.max(0, finiteOr(context.passengerCount, 0));
  const distanceKm = Math.max(0, finiteOr(context.distanceKm, DEFAULT_DISTANCE_KM));
  const trafficLevel = Math.max(0, finiteOr(context.trafficLevel, DEFAULT_TRAFFIC_LEVEL));

  const raw = (BASE_FARE_PER_PASSENGER * passengers + distanceKm * PER_KM_RATE) * (1 + 0.1 * trafficLevel);
  return Math.max(MINIMUM_FARE, roundFare(raw));
}

/**
 * Fare bracket for one passenger, or null when the passenger travels free (age 0 or less)
 */
export function fareBracketFor(passenger: PassengerAge): FareBracket | null {
  if (passenger === 'teacher') {
    return 'teacher';
  }
  if (passenger <= 0) {
    return null;
  }
  return passenger <= CHILD_MAX_AGE ? 'child' : 'adult';
}

/**
 * Sums a provider's fare table over the passengers. Missing brackets cost the adult price.
 */
export function fareForPassengers(fareTable: FareTable, passengers: ReadonlyArray<PassengerAge>): number {
  let total = 0;
  for (const passenger of passengers) {
    const bracket = fareBracketFor(passenger);
    if (bracket === null) {
      continue;
    }
    total += fareTable[bracket] ?? fareTable.adult;
  }
  return roundFare(total);
}

function withTimeout<T>(promise: Promise<T>, timeoutMs: number): Promise<T> {
  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => reject(new AppError(`Fare predictor timed out after ${timeoutMs}ms`, 504)), timeoutMs);
  });
  return Promise.race([promise, timeout]).finally(() => clearTimeout(timer));
}

/**
 * FareService prices trips. The remote predictor, when configured, is tried first;
 * any failure falls back to the local formula, so estimate() never rejects.
 */
export class FareService {
  constructor(
    private readonly predictor?: FarePredictor,
    private readonly timeoutMs: number = 2000
  ) {}

  async estimate(context: TripContext): Promise<number> {
    if (!this.predictor) {
      return localFareEstimate(context);
    }

    try {
      const fare = await withTimeout(this.predictor.predict(context), this.timeoutMs);
      if (!Number.isFinite(fare) || fare < 0) {
        throw new AppError(`Fare predictor returned an invalid fare: ${fare}`, 502);
      }
      return roundFare(fare);
    } catch (error) {
      logger.warn('Fare predictor failed, using local estimate:', {
        error: error instanceof Error ? error.message : 'Unknown error',
        passengerCount: context.passengerCount,
      });
      return localFareEstimate(context);
    }
  }

  fareForPassengers(fareTable: FareTable, passengers: ReadonlyArray<PassengerAge>): number {
    return fareForPassengers(fareTable, passengers);
  }
}
