import logger from '../config/logger';
import { BusServiceRegistry } from '../services/busService.registry';
import { DEFAULT_DISTANCE_KM, FareService } from '../services/fare.service';
import { ScheduleIndex } from '../services/schedule.service';
import { SessionStore } from '../services/session.store';
import { ConversationEngine, InboundEvent, OutboundResponse } from '../types/conversation';
import { BookingSummary, Offer, ScheduleOffer, ServiceOffer } from '../types/offer';
import { CreateBusServiceInput, PAYMENT_METHODS, PaymentMethod } from '../types/service';
import { ConversationStep, ServiceDraft, Session } from '../types/session';
import { AppError } from '../utils/AppError';
import {
  isSkip,
  parseClockTime,
  parseContact,
  parsePassengerAge,
  parsePassengerCount,
  parsePrice,
  parseRequiredText,
  parseSeatCount,
  ParseResult,
} from '../utils/inputValidators';
import {
  MenuValue,
  View,
  bookingConfirmedView,
  departureTimeView,
  noBusesView,
  offersView,
  passengerAgeView,
  passengerCountView,
  paymentToggleView,
  providerAuthView,
  providerFieldView,
  providerMenuView,
  roleMenuView,
  routeMenuView,
  statusToggleView,
  withNotice,
} from './views';

type InputShape = 'menu' | 'text';

/**
 * The single kind of input each step accepts
 */
const STEP_INPUT: Record<ConversationStep, InputShape> = {
  [ConversationStep.ROLE_SELECT]: 'menu',
  [ConversationStep.PASSENGER_ROUTE_SELECT]: 'menu',
  [ConversationStep.PASSENGER_COUNT_SELECT]: 'menu',
  [ConversationStep.PASSENGER_AGE_ENTRY]: 'text',
  [ConversationStep.PASSENGER_TIME_ENTRY]: 'text',
  [ConversationStep.OFFERS_PRESENTED]: 'menu',
  [ConversationStep.PROVIDER_AUTH]: 'text',
  [ConversationStep.PROVIDER_MENU]: 'menu',
  [ConversationStep.PROVIDER_ROUTE_ENTRY]: 'text',
  [ConversationStep.PROVIDER_NAME_ENTRY]: 'text',
  [ConversationStep.PROVIDER_DRIVER_ENTRY]: 'text',
  [ConversationStep.PROVIDER_VEHICLE_CLASS_ENTRY]: 'text',
  [ConversationStep.PROVIDER_SEATS_ENTRY]: 'text',
  [ConversationStep.PROVIDER_ADULT_FARE_ENTRY]: 'text',
  [ConversationStep.PROVIDER_TEACHER_FARE_ENTRY]: 'text',
  [ConversationStep.PROVIDER_CHILD_FARE_ENTRY]: 'text',
  [ConversationStep.PROVIDER_CONTACT_ENTRY]: 'text',
  [ConversationStep.PROVIDER_PAYMENT_TOGGLE]: 'menu',
  [ConversationStep.PROVIDER_STATUS_TOGGLE]: 'menu',
};

export const UNEXPECTED_MENU_INPUT = "🤔 Sorry, I didn't expect that here. Please use the options below.";
export const UNEXPECTED_TEXT_INPUT = "🤔 Sorry, I didn't expect that here. Please type your answer.";
export const NOT_COMPLETED_MESSAGE =
  "⚠️ That action did not complete because our records could not be saved. Please try again in a moment.";
export const GENERIC_ERROR_MESSAGE = "Sorry, something went wrong. Please type 'menu' to start over.";

export interface ConversationDependencies {
  sessions: SessionStore;
  registry: BusServiceRegistry;
  schedule: ScheduleIndex;
  fares: FareService;
  providerPassword: string;
  distanceKm?: number;
}

function requireAnswer<T>(value: T | undefined, name: string): T {
  if (value === undefined) {
    throw new AppError(`${name} missing from session`, 500);
  }
  return value;
}

/**
 * ConversationHandler runs the passenger and provider booking flows.
 * Each inbound event is validated against the current step; invalid input
 * never advances the step.
 */
export class ConversationHandler implements ConversationEngine {
  private readonly GLOBAL_COMMANDS = ['hi', 'menu', 'start', 'restart', 'cancel', '/start', '/help'];

  constructor(private readonly deps: ConversationDependencies) {}

  /**
   * Normalizes message body for command matching (lowercase, trim)
   */
  private normalizeCommand(body: string): string {
    return body.toLowerCase().trim();
  }

  private respond(chatId: string, view: View, alert?: boolean): OutboundResponse {
    return alert ? { chatId, ...view, alert } : { chatId, ...view };
  }

  private newSession(chatId: string): Session {
    const now = new Date().toISOString();
    return {
      id: chatId,
      step: ConversationStep.ROLE_SELECT,
      role: 'unset',
      answers: {},
      offers: [],
      createdAt: now,
      updatedAt: now,
    };
  }

  private async save(session: Session): Promise<void> {
    session.updatedAt = new Date().toISOString();
    await this.deps.sessions.set(session);
  }

  private async startOver(chatId: string, notice?: string): Promise<OutboundResponse> {
    await this.deps.sessions.delete(chatId);
    await this.save(this.newSession(chatId));
    const view = roleMenuView();
    return this.respond(chatId, notice ? withNotice(notice, view) : view);
  }

  /**
   * Main entry point: one inbound event in, one response out
   */
  async handleEvent(event: InboundEvent): Promise<OutboundResponse> {
    try {
      const command = this.normalizeCommand(event.payload);

      logger.info(`Handling event from ${event.chatId}:`, { kind: event.kind, payload: event.payload });

      if (event.kind === 'freeText' && this.GLOBAL_COMMANDS.includes(command)) {
        return await this.startOver(event.chatId, command === 'cancel' ? '🛑 Cancelled.' : undefined);
      }
      if (event.kind === 'menuSelection' && event.payload === MenuValue.MAIN_MENU) {
        return await this.startOver(event.chatId);
      }

      const session = await this.deps.sessions.get(event.chatId);
      if (!session) {
        return await this.startOver(event.chatId);
      }

      const expected = STEP_INPUT[session.step];
      if ((expected === 'menu') !== (event.kind === 'menuSelection')) {
        return await this.unexpectedInput(session);
      }

      if (expected === 'menu') {
        const view = await this.renderStep(session);
        if (!view.menu?.some((option) => option.value === event.payload)) {
          return await this.unexpectedInput(session, view);
        }
        return await this.handleMenuSelection(session, event.payload);
      }

      return await this.handleText(session, event.payload.trim());
    } catch (error) {
      return this.handleFailure(event, error);
    }
  }

  private async handleFailure(event: InboundEvent, error: unknown): Promise<OutboundResponse> {
    if (error instanceof AppError && error.isPersistenceFailure) {
      logger.error('Conversation step not persisted:', {
        error: error.message,
        chatId: event.chatId,
        payload: event.payload,
      });
      return { chatId: event.chatId, text: NOT_COMPLETED_MESSAGE };
    }

    logger.error('ConversationHandler error:', {
      error: error instanceof Error ? error.message : 'Unknown error',
      stack: error instanceof Error ? error.stack : undefined,
      chatId: event.chatId,
      payload: event.payload,
    });

    try {
      await this.deps.sessions.delete(event.chatId);
    } catch (deleteError) {
      logger.error('Failed to clear session after error:', {
        error: deleteError instanceof Error ? deleteError.message : 'Unknown error',
        chatId: event.chatId,
      });
    }
    return { chatId: event.chatId, text: GENERIC_ERROR_MESSAGE };
  }

  private async unexpectedInput(session: Session, current?: View): Promise<OutboundResponse> {
    const view = current ?? (await this.renderStep(session));
    const notice = STEP_INPUT[session.step] === 'menu' ? UNEXPECTED_MENU_INPUT : UNEXPECTED_TEXT_INPUT;
    return this.respond(session.id, withNotice(notice, view));
  }

  private async retry(session: Session, error: string): Promise<OutboundResponse> {
    return this.respond(session.id, withNotice(error, await this.renderStep(session)));
  }

  private async advance(session: Session, step: ConversationStep, notice?: string): Promise<OutboundResponse> {
    if (session.step !== step) {
      session.answers.menuPage = undefined;
    }
    session.step = step;
    await this.save(session);
    const view = await this.renderStep(session);
    return this.respond(session.id, notice ? withNotice(notice, view) : view);
  }

  /**
   * Routes passengers can pick: timetable routes plus routes of active services
   */
  private async availableRoutes(): Promise<string[]> {
    const serviceRoutes = await this.deps.registry.activeRouteNames();
    return [...new Set([...this.deps.schedule.routeNames(), ...serviceRoutes])].sort();
  }

  /**
   * Builds the prompt of the session's current step from current data.
   * Used for first display, retries and re-renders alike.
   */
  private async renderStep(session: Session): Promise<View> {
    const { answers } = session;

    switch (session.step) {
      case ConversationStep.ROLE_SELECT:
        return roleMenuView();

      case ConversationStep.PASSENGER_ROUTE_SELECT:
        return routeMenuView(await this.availableRoutes(), answers.menuPage ?? 0);

      case ConversationStep.PASSENGER_COUNT_SELECT:
        return passengerCountView(requireAnswer(answers.route, 'Route'));

      case ConversationStep.PASSENGER_AGE_ENTRY:
        return passengerAgeView(
          (answers.passengers ?? []).length + 1,
          requireAnswer(answers.passengerCount, 'Passenger count')
        );

      case ConversationStep.PASSENGER_TIME_ENTRY:
        return departureTimeView();

      case ConversationStep.OFFERS_PRESENTED:
        return offersView(
          requireAnswer(answers.route, 'Route'),
          requireAnswer(answers.time, 'Time'),
          requireAnswer(answers.scheduleFare, 'Schedule fare'),
          session.offers,
          answers.menuPage ?? 0
        );

      case ConversationStep.PROVIDER_AUTH:
        return providerAuthView();

      case ConversationStep.PROVIDER_MENU:
        return providerMenuView();

      case ConversationStep.PROVIDER_PAYMENT_TOGGLE:
        return paymentToggleView(answers.draft?.paymentMethods ?? []);

      case ConversationStep.PROVIDER_STATUS_TOGGLE:
        return statusToggleView(await this.deps.registry.listAll({ ownerChatId: session.id }), answers.menuPage ?? 0);

      default: {
        const fieldView = providerFieldView(session.step);
        if (!fieldView) {
          throw new AppError(`No view for step ${session.step}`, 500);
        }
        return fieldView;
      }
    }
  }

  private async handleMenuSelection(session: Session, value: string): Promise<OutboundResponse> {
    // Only offered by paged menus, so the number has been checked against the current view
    if (value.startsWith(MenuValue.PAGE_PREFIX)) {
      session.answers.menuPage = parseInt(value.slice(MenuValue.PAGE_PREFIX.length), 10);
      return this.advance(session, session.step);
    }

    switch (session.step) {
      case ConversationStep.ROLE_SELECT:
        return this.handleRoleSelect(session, value);

      case ConversationStep.PASSENGER_ROUTE_SELECT:
        session.answers = { route: value.slice(MenuValue.ROUTE_PREFIX.length) };
        return this.advance(session, ConversationStep.PASSENGER_COUNT_SELECT);

      case ConversationStep.PASSENGER_COUNT_SELECT:
        return this.handlePassengerCount(session, value.slice(MenuValue.COUNT_PREFIX.length));

      case ConversationStep.OFFERS_PRESENTED:
        return this.handleOfferSelection(session, value.slice(MenuValue.OFFER_PREFIX.length));

      case ConversationStep.PROVIDER_MENU:
        return this.handleProviderMenu(session, value);

      case ConversationStep.PROVIDER_PAYMENT_TOGGLE:
        return this.handlePaymentToggle(session, value);

      case ConversationStep.PROVIDER_STATUS_TOGGLE:
        return this.handleStatusToggle(session, value);

      default:
        throw new AppError(`Step ${session.step} does not take menu input`, 500);
    }
  }

  private async handleText(session: Session, text: string): Promise<OutboundResponse> {
    switch (session.step) {
      case ConversationStep.PASSENGER_AGE_ENTRY:
        return this.handlePassengerAge(session, text);

      case ConversationStep.PASSENGER_TIME_ENTRY:
        return this.handleDepartureTime(session, text);

      case ConversationStep.PROVIDER_AUTH:
        return this.handleProviderAuth(session, text);

      default:
        return this.handleProviderField(session, text);
    }
  }

  // ---- passenger flow ----

  private async handleRoleSelect(session: Session, value: string): Promise<OutboundResponse> {
    if (value === MenuValue.ROLE_PROVIDER) {
      session.role = 'provider';
      session.answers = {};
      return this.advance(session, ConversationStep.PROVIDER_AUTH);
    }

    const routes = await this.availableRoutes();
    if (routes.length === 0) {
      return this.respond(session.id, withNotice('No routes available. Contact the admin.', roleMenuView()), true);
    }

    session.role = 'passenger';
    session.answers = {};
    session.offers = [];
    return this.advance(session, ConversationStep.PASSENGER_ROUTE_SELECT);
  }

  private async handlePassengerCount(session: Session, value: string): Promise<OutboundResponse> {
    const parsed = parsePassengerCount(value);
    if (!parsed.ok) {
      return this.retry(session, parsed.error);
    }

    session.answers.passengerCount = parsed.value.count;
    session.answers.passengerCountLabel = parsed.value.label;
    session.answers.passengers = [];
    return this.advance(session, ConversationStep.PASSENGER_AGE_ENTRY);
  }

  private async handlePassengerAge(session: Session, text: string): Promise<OutboundResponse> {
    const parsed = parsePassengerAge(text);
    if (!parsed.ok) {
      return this.retry(session, parsed.error);
    }

    const passengerCount = requireAnswer(session.answers.passengerCount, 'Passenger count');
    const passengers = [...(session.answers.passengers ?? []), parsed.value];
    session.answers.passengers = passengers;

    if (passengers.length < passengerCount) {
      return this.advance(session, ConversationStep.PASSENGER_AGE_ENTRY);
    }
    return this.advance(session, ConversationStep.PASSENGER_TIME_ENTRY);
  }

  private async handleDepartureTime(session: Session, text: string): Promise<OutboundResponse> {
    const parsed = parseClockTime(text);
    if (!parsed.ok) {
      return this.retry(session, parsed.error);
    }

    const route = requireAnswer(session.answers.route, 'Route');
    const passengerCount = requireAnswer(session.answers.passengerCount, 'Passenger count');
    const passengers = requireAnswer(session.answers.passengers, 'Passenger ages');
    const time = parsed.value;

    const scheduleFare = await this.deps.fares.estimate({
      passengerCount,
      distanceKm: this.deps.distanceKm ?? DEFAULT_DISTANCE_KM,
    });

    const scheduleOffers: ScheduleOffer[] = this.deps.schedule.matching(route, time).map((entry) => ({
      kind: 'schedule',
      id: `SCH-${entry.id}`,
      label: `Public Bus (${entry.vehicleClass})`,
      fare: scheduleFare,
      entryId: entry.id,
      routeName: entry.routeName,
      departureTimes: entry.departureTimes,
    }));

    const services = await this.deps.registry.listAll({ route, status: 'active' });
    const serviceOffers: ServiceOffer[] = services.map((service) => ({
      kind: 'service',
      id: `SVC-${service.id}`,
      label: service.serviceName,
      fare: this.deps.fares.fareForPassengers(service.fareTable, passengers),
      serviceId: service.id,
      serviceName: service.serviceName,
      contact: service.contact,
      paymentMethods: service.paymentMethods,
    }));

    const offers: Offer[] = [...scheduleOffers, ...serviceOffers];
    logger.info(`Search for ${route} at ${time}: ${scheduleOffers.length} scheduled, ${serviceOffers.length} provider offers`);

    if (offers.length === 0) {
      await this.deps.sessions.delete(session.id);
      return this.respond(session.id, noBusesView(route, time));
    }

    session.answers.time = time;
    session.answers.scheduleFare = scheduleFare;
    session.offers = offers;
    return this.advance(session, ConversationStep.OFFERS_PRESENTED);
  }

  private async handleOfferSelection(session: Session, offerId: string): Promise<OutboundResponse> {
    const offer = session.offers.find((candidate) => candidate.id === offerId);
    if (!offer) {
      return this.unexpectedInput(session);
    }

    const route = requireAnswer(session.answers.route, 'Route');
    const time = requireAnswer(session.answers.time, 'Time');
    const passengerCount = requireAnswer(session.answers.passengerCount, 'Passenger count');

    if (offer.kind === 'schedule') {
      return this.completeBooking(session, {
        offerId: offer.id,
        routeName: route,
        time,
        passengerCount,
        fare: offer.fare,
        serviceName: offer.label,
        contact: null,
        remainingSeats: null,
        estimated: true,
      });
    }

    // Status and seats are checked in the same write as the deduction
    const result = await this.deps.registry.decrementSeats(offer.serviceId, passengerCount);
    if (!result.ok) {
      const notice =
        result.reason === 'insufficientSeats'
          ? `⚠️ Not enough seats left on ${offer.serviceName} for ${passengerCount} passenger(s). Please pick another bus.`
          : `⚠️ ${offer.serviceName} is no longer available. Please pick another bus.`;
      return this.respond(session.id, withNotice(notice, await this.renderStep(session)), true);
    }

    return this.completeBooking(session, {
      offerId: offer.id,
      routeName: route,
      time,
      passengerCount,
      fare: offer.fare,
      serviceName: result.service.serviceName,
      contact: result.service.contact,
      remainingSeats: result.service.remainingSeats,
      estimated: false,
    });
  }

  private async completeBooking(session: Session, summary: BookingSummary): Promise<OutboundResponse> {
    logger.info(`Booking confirmed for ${session.id}:`, summary);

    // Seats are already deducted at this point, so a failed cleanup must not hide the confirmation
    try {
      await this.deps.sessions.delete(session.id);
    } catch (error) {
      logger.error('Failed to clear session after booking:', {
        error: error instanceof Error ? error.message : 'Unknown error',
        chatId: session.id,
      });
    }
    return this.respond(session.id, bookingConfirmedView(summary));
  }

  // ---- provider flow ----

  private async handleProviderAuth(session: Session, text: string): Promise<OutboundResponse> {
    if (text !== this.deps.providerPassword) {
      logger.warn(`Failed provider login from ${session.id}`);
      return this.retry(session, "❌ Wrong password. Try again or type 'menu' to start over.");
    }

    session.answers.providerAuthenticated = true;
    return this.advance(session, ConversationStep.PROVIDER_MENU, '🔓 Access Granted');
  }

  private async handleProviderMenu(session: Session, value: string): Promise<OutboundResponse> {
    if (value === MenuValue.PROVIDER_ADD) {
      session.answers.draft = {};
      return this.advance(session, ConversationStep.PROVIDER_ROUTE_ENTRY);
    }

    const services = await this.deps.registry.listAll({ ownerChatId: session.id });
    if (services.length === 0) {
      return this.respond(session.id, providerMenuView('No services added yet.'), true);
    }
    return this.advance(session, ConversationStep.PROVIDER_STATUS_TOGGLE);
  }

  /**
   * Validates one provider field, stores it in the draft and moves to the next field
   */
  private async handleProviderField(session: Session, text: string): Promise<OutboundResponse> {
    const draft: ServiceDraft = session.answers.draft ?? {};
    session.answers.draft = draft;

    const store = async <T>(
      parsed: ParseResult<T>,
      apply: (value: T) => void,
      next: ConversationStep
    ): Promise<OutboundResponse> => {
      if (!parsed.ok) {
        return this.retry(session, parsed.error);
      }
      apply(parsed.value);
      return this.advance(session, next);
    };

    const fares = (): NonNullable<ServiceDraft['fares']> => {
      draft.fares = draft.fares ?? {};
      return draft.fares;
    };

    switch (session.step) {
      case ConversationStep.PROVIDER_ROUTE_ENTRY:
        return store(parseRequiredText(text, 'Route name'), (value) => {
          draft.route = value;
        }, ConversationStep.PROVIDER_NAME_ENTRY);

      case ConversationStep.PROVIDER_NAME_ENTRY:
        return store(parseRequiredText(text, 'Service name'), (value) => {
          draft.serviceName = value;
        }, ConversationStep.PROVIDER_DRIVER_ENTRY);

      case ConversationStep.PROVIDER_DRIVER_ENTRY:
        return store(parseRequiredText(text, 'Driver name'), (value) => {
          draft.driverName = value;
        }, ConversationStep.PROVIDER_VEHICLE_CLASS_ENTRY);

      case ConversationStep.PROVIDER_VEHICLE_CLASS_ENTRY: {
        const parsed: ParseResult<string | null> = isSkip(text)
          ? { ok: true, value: null }
          : parseRequiredText(text, 'Vehicle class');
        return store(parsed, (value) => {
          draft.vehicleClass = value;
        }, ConversationStep.PROVIDER_SEATS_ENTRY);
      }

      case ConversationStep.PROVIDER_SEATS_ENTRY:
        return store(parseSeatCount(text), (value) => {
          draft.totalSeats = value;
        }, ConversationStep.PROVIDER_ADULT_FARE_ENTRY);

      case ConversationStep.PROVIDER_ADULT_FARE_ENTRY:
        return store(parsePrice(text), (value) => {
          fares().adult = value;
        }, ConversationStep.PROVIDER_TEACHER_FARE_ENTRY);

      case ConversationStep.PROVIDER_TEACHER_FARE_ENTRY: {
        const adult = requireAnswer(draft.fares?.adult, 'Adult fare');
        const parsed: ParseResult<number> = isSkip(text) ? { ok: true, value: adult } : parsePrice(text);
        return store(parsed, (value) => {
          fares().teacher = value;
        }, ConversationStep.PROVIDER_CHILD_FARE_ENTRY);
      }

      case ConversationStep.PROVIDER_CHILD_FARE_ENTRY: {
        const adult = requireAnswer(draft.fares?.adult, 'Adult fare');
        const parsed: ParseResult<number> = isSkip(text) ? { ok: true, value: adult } : parsePrice(text);
        return store(parsed, (value) => {
          fares().child = value;
        }, ConversationStep.PROVIDER_CONTACT_ENTRY);
      }

      case ConversationStep.PROVIDER_CONTACT_ENTRY:
        return store(parseContact(text), (value) => {
          draft.contact = value;
          draft.paymentMethods = [];
        }, ConversationStep.PROVIDER_PAYMENT_TOGGLE);

      default:
        throw new AppError(`Step ${session.step} does not take text input`, 500);
    }
  }

  private async handlePaymentToggle(session: Session, value: string): Promise<OutboundResponse> {
    const draft = requireAnswer(session.answers.draft, 'Service draft');

    if (value === MenuValue.PROVIDER_SAVE) {
      return this.saveService(session, draft);
    }

    const method = PAYMENT_METHODS.find((candidate) => `${MenuValue.PAY_PREFIX}${candidate}` === value);
    if (!method) {
      return this.unexpectedInput(session);
    }

    const current: PaymentMethod[] = draft.paymentMethods ?? [];
    draft.paymentMethods = current.includes(method)
      ? current.filter((selected) => selected !== method)
      : [...current, method];
    return this.advance(session, ConversationStep.PROVIDER_PAYMENT_TOGGLE);
  }

  private async saveService(session: Session, draft: ServiceDraft): Promise<OutboundResponse> {
    const fares = requireAnswer(draft.fares, 'Fares');
    const input: CreateBusServiceInput = {
      ownerChatId: session.id,
      route: requireAnswer(draft.route, 'Route'),
      serviceName: requireAnswer(draft.serviceName, 'Service name'),
      driverName: requireAnswer(draft.driverName, 'Driver name'),
      vehicleClass: draft.vehicleClass ?? null,
      fareTable: {
        adult: requireAnswer(fares.adult, 'Adult fare'),
        teacher: fares.teacher,
        child: fares.child,
      },
      totalSeats: requireAnswer(draft.totalSeats, 'Total seats'),
      contact: requireAnswer(draft.contact, 'Contact'),
      paymentMethods: draft.paymentMethods ?? [],
    };

    const service = await this.deps.registry.create(input);
    session.answers.draft = undefined;
    return this.advance(session, ConversationStep.PROVIDER_MENU, `✅ Service Saved Successfully! (ID ${service.id})`);
  }

  private async handleStatusToggle(session: Session, value: string): Promise<OutboundResponse> {
    if (value === MenuValue.PROVIDER_MENU) {
      return this.advance(session, ConversationStep.PROVIDER_MENU);
    }

    // The menu only lists this provider's services, so the id has been checked already
    await this.deps.registry.toggleStatus(value.slice(MenuValue.TOGGLE_PREFIX.length));
    return this.advance(session, ConversationStep.PROVIDER_STATUS_TOGGLE);
  }
}
