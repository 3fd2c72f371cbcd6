import { PaymentMethod } from './service';

interface OfferBase {
  id: string;
  label: string;
  fare: number;
}

/**
 * Offer backed by the static timetable. Has no seat inventory and an estimated fare.
 */
export interface ScheduleOffer extends OfferBase {
  kind: 'schedule';
  entryId: string;
  routeName: string;
  departureTimes: string[];
}

/**
 * Offer backed by a provider service. Confirming it deducts seats.
 */
export interface ServiceOffer extends OfferBase {
  kind: 'service';
  serviceId: string;
  serviceName: string;
  contact: string;
  paymentMethods: PaymentMethod[];
}

export type Offer = ScheduleOffer | ServiceOffer;

/**
 * Summary of a confirmed booking
 */
export interface BookingSummary {
  offerId: string;
  routeName: string;
  time: string;
  passengerCount: number;
  fare: number;
  serviceName: string;
  contact: string | null;
  remainingSeats: number | null;
  estimated: boolean;
}
