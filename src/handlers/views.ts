import { MenuOption } from '../types/conversation';
import { BookingSummary, Offer } from '../types/offer';
import { BusService, PAYMENT_METHODS, PaymentMethod } from '../types/service';
import { ConversationStep } from '../types/session';
import { MAX_AGE, MAX_PASSENGERS, MIN_AGE } from '../utils/inputValidators';

/**
 * A prompt and its options, before it is addressed to a chat.
 * Every builder here is pure: the same data always renders the same view.
 */
export interface View {
  text: string;
  menu?: MenuOption[];
}

export const MenuValue = {
  MAIN_MENU: 'menu_main',
  ROLE_PASSENGER: 'role_passenger',
  ROLE_PROVIDER: 'role_provider',
  PROVIDER_ADD: 'prov_add',
  PROVIDER_STATUS: 'prov_status',
  PROVIDER_MENU: 'prov_menu',
  PROVIDER_SAVE: 'prov_save',
  ROUTE_PREFIX: 'route:',
  COUNT_PREFIX: 'count:',
  OFFER_PREFIX: 'offer:',
  PAY_PREFIX: 'pay:',
  TOGGLE_PREFIX: 'toggle:',
  PAGE_PREFIX: 'page:',
} as const;

// One WhatsApp list message holds at most 10 rows
export const MAX_MENU_OPTIONS = 10;

const MAIN_MENU_OPTION: MenuOption = { label: '🔙 Main Menu', value: MenuValue.MAIN_MENU };

export function formatFare(fare: number): string {
  return `Rs. ${fare.toFixed(2)}`;
}

function capitalize(value: string): string {
  return value.charAt(0).toUpperCase() + value.slice(1);
}

/**
 * Fits `options` into pages of one list each. Every page keeps the `fixed` options
 * (back / main menu) and links to its neighbours; an out-of-range page shows the nearest one.
 */
export function paginate(options: MenuOption[], page: number, fixed: MenuOption[]): MenuOption[] {
  if (options.length + fixed.length <= MAX_MENU_OPTIONS) {
    return [...options, ...fixed];
  }

  const perPage = MAX_MENU_OPTIONS - fixed.length - 2;
  const lastPage = Math.ceil(options.length / perPage) - 1;
  const current = Math.min(Math.max(page, 0), lastPage);

  const navigation: MenuOption[] = [];
  if (current > 0) {
    navigation.push({ label: '⬅️ Previous', value: `${MenuValue.PAGE_PREFIX}${current - 1}` });
  }
  if (current < lastPage) {
    navigation.push({ label: '➡️ More…', value: `${MenuValue.PAGE_PREFIX}${current + 1}` });
  }

  return [...options.slice(current * perPage, (current + 1) * perPage), ...navigation, ...fixed];
}

export function roleMenuView(): View {
  return {
    text: '👋 Welcome to RouteFare!\n\nPlease select your role:',
    menu: [
      { label: '👤 Passenger', value: MenuValue.ROLE_PASSENGER },
      { label: '🚌 Bus Provider', value: MenuValue.ROLE_PROVIDER },
    ],
  };
}

export function routeMenuView(routes: string[], page = 0): View {
  return {
    text: '📍 Select your route:',
    menu: paginate(
      routes.map((route) => ({ label: route, value: `${MenuValue.ROUTE_PREFIX}${route}` })),
      page,
      [MAIN_MENU_OPTION]
    ),
  };
}

export function passengerCountView(route: string): View {
  const counts = Array.from({ length: MAX_PASSENGERS - 1 }, (_, index) => String(index + 1));
  return {
    text: `Selected: ${route}\n\n👥 How many passengers?`,
    menu: [...counts, `${MAX_PASSENGERS}+`].map((count) => ({
      label: count,
      value: `${MenuValue.COUNT_PREFIX}${count}`,
    })),
  };
}

export function passengerAgeView(passengerNumber: number, passengerCount: number): View {
  return {
    text:
      `👤 Passenger ${passengerNumber} of ${passengerCount}: enter the age (${MIN_AGE}-${MAX_AGE}).\n` +
      `Type "teacher" or "student" for the teacher/student fare.`,
  };
}

export function departureTimeView(): View {
  return { text: '⏰ Enter your departure time in HH:MM (example: 13:45):' };
}

export function offersView(route: string, time: string, scheduleFare: number, offers: Offer[], page = 0): View {
  return {
    text:
      `🚌 Your Search Summary\nRoute: ${route}\nTime: ${time}\n` +
      `Estimated Fare: ${formatFare(scheduleFare)}\n\nSelect a bus to confirm your booking:`,
    menu: paginate(
      offers.map((offer) => ({
        label: offer.label,
        value: `${MenuValue.OFFER_PREFIX}${offer.id}`,
        description: offerDescription(offer),
      })),
      page,
      [MAIN_MENU_OPTION]
    ),
  };
}

export function offerDescription(offer: Offer): string {
  if (offer.kind === 'schedule') {
    return `Scheduled (${offer.departureTimes.slice(0, 2).join(', ')}...) | Est. ${formatFare(offer.fare)}`;
  }
  const payment = offer.paymentMethods.map(capitalize).join(', ') || 'N/A';
  return `Fare: ${formatFare(offer.fare)} | Contact: ${offer.contact} | Payment: ${payment}`;
}

export function noBusesView(route: string, time: string): View {
  return {
    text: `❌ No buses found for ${route} at ${time}.`,
    menu: [{ label: '🔄 New Search', value: MenuValue.MAIN_MENU }],
  };
}

export function bookingConfirmedView(summary: BookingSummary): View {
  const lines = [
    '✅ BOOKING CONFIRMED! 🎉',
    '',
    `🚍 Service: ${summary.serviceName}`,
    `📍 Route: ${summary.routeName} at ${summary.time}`,
    `👥 Passengers: ${summary.passengerCount}`,
    summary.estimated
      ? `💲 Fare: ${formatFare(summary.fare)} (estimated fare, confirm with operator)`
      : `💲 Fare: ${formatFare(summary.fare)}`,
    `📞 Contact: ${summary.contact ?? 'N/A'}`,
  ];
  if (summary.remainingSeats !== null) {
    lines.push(`💺 Seats remaining: ${summary.remainingSeats}`);
  }
  lines.push('', 'Thank you for using RouteFare. Please be ready to board at the departure time.');

  return {
    text: lines.join('\n'),
    menu: [{ label: '🔄 New Search', value: MenuValue.MAIN_MENU }],
  };
}

export function providerAuthView(): View {
  return { text: '🔒 Enter Provider Password:' };
}

export function providerMenuView(notice?: string): View {
  const heading = 'Manage your fleet:';
  return {
    text: notice ? `${notice}\n\n${heading}` : heading,
    menu: [
      { label: '➕ Add Service', value: MenuValue.PROVIDER_ADD },
      { label: '🔁 Toggle Status', value: MenuValue.PROVIDER_STATUS },
      MAIN_MENU_OPTION,
    ],
  };
}

const PROVIDER_FIELD_PROMPTS: Partial<Record<ConversationStep, string>> = {
  [ConversationStep.PROVIDER_ROUTE_ENTRY]: '🆕 Add Service\n\nEnter the Route Name (e.g., Kandy-Colombo):',
  [ConversationStep.PROVIDER_NAME_ENTRY]: '🚍 Enter the Bus Service/Company Name (e.g., ABC Express):',
  [ConversationStep.PROVIDER_DRIVER_ENTRY]: '🧑 Enter Driver Name:',
  [ConversationStep.PROVIDER_VEHICLE_CLASS_ENTRY]: '🚌 Enter the Vehicle Class (e.g., Luxury, Semi-Luxury), or type "skip":',
  [ConversationStep.PROVIDER_SEATS_ENTRY]: '💺 Enter the total number of seats:',
  [ConversationStep.PROVIDER_ADULT_FARE_ENTRY]: '💵 Enter the Adult Fare (e.g., 150.00):',
  [ConversationStep.PROVIDER_TEACHER_FARE_ENTRY]: '🎓 Enter the Teacher/Student Fare, or type "skip" to use the adult fare:',
  [ConversationStep.PROVIDER_CHILD_FARE_ENTRY]: '🧒 Enter the Child Fare, or type "skip" to use the adult fare:',
  [ConversationStep.PROVIDER_CONTACT_ENTRY]: '📞 Enter Contact Number:',
};

export function providerFieldView(step: ConversationStep): View | undefined {
  const text = PROVIDER_FIELD_PROMPTS[step];
  return text === undefined ? undefined : { text };
}

export function paymentToggleView(selected: PaymentMethod[]): View {
  return {
    text: '💳 Payment Options\nToggle allowed methods, then save:',
    menu: [
      ...PAYMENT_METHODS.map((method) => ({
        label: `${selected.includes(method) ? '✅' : '⬜'} ${capitalize(method)}`,
        value: `${MenuValue.PAY_PREFIX}${method}`,
      })),
      { label: '💾 Save & Finish', value: MenuValue.PROVIDER_SAVE },
    ],
  };
}

/**
 * One toggle per service, rebuilt from registry data after every change
 */
export function statusToggleView(services: BusService[], page = 0): View {
  return {
    text: 'Tap to toggle availability (Holiday/Weather):',
    menu: paginate(
      services.map((service) => ({
        label: `${service.serviceName} - ${service.route}`,
        value: `${MenuValue.TOGGLE_PREFIX}${service.id}`,
        description: service.status === 'active' ? '🟢 ACTIVE' : '🔴 UNAVAILABLE',
      })),
      page,
      [{ label: '🔙 Provider Menu', value: MenuValue.PROVIDER_MENU }]
    ),
  };
}

export function withNotice(notice: string, view: View): View {
  return { ...view, text: `${notice}\n\n${view.text}` };
}
