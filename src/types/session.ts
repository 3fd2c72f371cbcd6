import { FareTable, PaymentMethod } from './service';
import { Offer } from './offer';

/**
 * ConversationStep is the position of a chat in the booking flow.
 * Each step waits for exactly one kind of input.
 */
export enum ConversationStep {
  ROLE_SELECT = 'ROLE_SELECT',

  PASSENGER_ROUTE_SELECT = 'PASSENGER_ROUTE_SELECT',
  PASSENGER_COUNT_SELECT = 'PASSENGER_COUNT_SELECT',
  PASSENGER_AGE_ENTRY = 'PASSENGER_AGE_ENTRY',
  PASSENGER_TIME_ENTRY = 'PASSENGER_TIME_ENTRY',
  OFFERS_PRESENTED = 'OFFERS_PRESENTED',

  PROVIDER_AUTH = 'PROVIDER_AUTH',
  PROVIDER_MENU = 'PROVIDER_MENU',
  PROVIDER_ROUTE_ENTRY = 'PROVIDER_ROUTE_ENTRY',
  PROVIDER_NAME_ENTRY = 'PROVIDER_NAME_ENTRY',
  PROVIDER_DRIVER_ENTRY = 'PROVIDER_DRIVER_ENTRY',
  PROVIDER_VEHICLE_CLASS_ENTRY = 'PROVIDER_VEHICLE_CLASS_ENTRY',
  PROVIDER_SEATS_ENTRY = 'PROVIDER_SEATS_ENTRY',
  PROVIDER_ADULT_FARE_ENTRY = 'PROVIDER_ADULT_FARE_ENTRY',
  PROVIDER_TEACHER_FARE_ENTRY = 'PROVIDER_TEACHER_FARE_ENTRY',
  PROVIDER_CHILD_FARE_ENTRY = 'PROVIDER_CHILD_FARE_ENTRY',
  PROVIDER_CONTACT_ENTRY = 'PROVIDER_CONTACT_ENTRY',
  PROVIDER_PAYMENT_TOGGLE = 'PROVIDER_PAYMENT_TOGGLE',
  PROVIDER_STATUS_TOGGLE = 'PROVIDER_STATUS_TOGGLE',
}

export type Role = 'unset' | 'passenger' | 'provider';

/**
 * A passenger is described by an age in years, or by the teacher/student
 * designation which selects the teacher fare bracket regardless of age.
 */
export type PassengerAge = number | 'teacher';

/**
 * Service fields collected from a provider before it is saved
 */
export interface ServiceDraft {
  route?: string;
  serviceName?: string;
  driverName?: string;
  vehicleClass?: string | null;
  totalSeats?: number;
  fares?: Partial<FareTable>;
  contact?: string;
  paymentMethods?: PaymentMethod[];
}

/**
 * SessionAnswers stores validated user choices.
 * A field is only read by steps that come after the one writing it.
 */
export interface SessionAnswers {
  // passenger
  route?: string;
  passengerCount?: number;
  passengerCountLabel?: string;
  passengers?: PassengerAge[];
  time?: string;
  scheduleFare?: number;

  // page of a long menu (routes, offers, status toggles); cleared when the step changes
  menuPage?: number;

  // provider
  providerAuthenticated?: boolean;
  draft?: ServiceDraft;
}

/**
 * Session is the complete per-chat state persisted by the session store
 */
export interface Session {
  id: string;
  step: ConversationStep;
  role: Role;
  answers: SessionAnswers;
  offers: Offer[];
  createdAt: string;
  updatedAt: string;
}
