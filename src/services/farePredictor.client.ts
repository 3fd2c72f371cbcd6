import axios, { AxiosInstance } from 'axios';
import logger from '../config/logger';
import { AppError } from '../utils/AppError';

/**
 * Trip parameters a fare is computed from
 */
export interface TripContext {
  passengerCount: number;
  distanceKm?: number;
  trafficLevel?: number;
}

/**
 * A model that prices a trip. Implementations may be slow or fail;
 * FareService bounds and absorbs both.
 */
export interface FarePredictor {
  predict(context: TripContext): Promise<number>;
}

function readFare(body: unknown): number | undefined {
  if (typeof body !== 'object' || body === null) {
    return undefined;
  }
  if ('fare' in body && typeof body.fare === 'number') {
    return body.fare;
  }
  // Hosted model endpoints answer { predictions: [value] }
  if ('predictions' in body && Array.isArray(body.predictions) && typeof body.predictions[0] === 'number') {
    return body.predictions[0];
  }
  return undefined;
}

/**
 * RemoteFarePredictor calls an HTTP fare model
 */
export class RemoteFarePredictor implements FarePredictor {
  private readonly axiosInstance: AxiosInstance;

  constructor(baseUrl: string, timeoutMs: number) {
    this.axiosInstance = axios.create({
      baseURL: baseUrl,
      timeout: timeoutMs,
      headers: {
        'Content-Type': 'application/json',
      },
    });
  }

  async predict(context: TripContext): Promise<number> {
    const response = await this.axiosInstance.post<unknown>('', {
      distance_km: context.distanceKm,
      traffic_level_num: context.trafficLevel,
      passenger_count: context.passengerCount,
    });

    const fare = readFare(response.data);
    if (fare === undefined) {
      logger.warn('Fare predictor returned an unexpected body:', { body: response.data });
      throw new AppError('Fare predictor response has no fare', 502);
    }
    return fare;
  }
}
