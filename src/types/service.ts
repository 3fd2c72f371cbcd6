export type ServiceStatus = 'active' | 'unavailable';

export const PAYMENT_METHODS = ['weekly', 'monthly'] as const;

export type PaymentMethod = (typeof PAYMENT_METHODS)[number];

export type FareBracket = 'adult' | 'teacher' | 'child';

/**
 * Price per passenger for each bracket. Missing brackets are charged at the adult price.
 */
export interface FareTable {
  adult: number;
  teacher?: number;
  child?: number;
}

/**
 * A bookable bus offering registered by a provider
 */
export interface BusService {
  id: string;
  ownerChatId: string;
  route: string;
  serviceName: string;
  driverName: string;
  vehicleClass: string | null;
  fareTable: FareTable;
  totalSeats: number;
  remainingSeats: number;
  status: ServiceStatus;
  contact: string;
  paymentMethods: PaymentMethod[];
  createdAt: Date;
}

export type CreateBusServiceInput = Omit<BusService, 'id' | 'remainingSeats' | 'status' | 'createdAt'>;

export interface BusServiceFilter {
  route?: string;
  status?: ServiceStatus;
  ownerChatId?: string;
}

export type SeatDecrementResult =
  | { ok: true; service: BusService }
  | { ok: false; reason: 'insufficientSeats' | 'unavailable' | 'notFound' };
