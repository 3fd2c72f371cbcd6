import { PassengerAge } from '../types/session';
import { minutesToTime, timeToMinutes } from './clock';

export type ParseResult<T> = { ok: true; value: T } | { ok: false; error: string };

export const MIN_AGE = 0;
export const MAX_AGE = 120;
export const MAX_PASSENGERS = 7;
export const MAX_SEATS = 500;
export const MAX_TEXT_LENGTH = 60;

const SKIP_WORDS = ['skip', '-'];
const TEACHER_WORDS = ['teacher', 'student'];

function ok<T>(value: T): ParseResult<T> {
  return { ok: true, value };
}

function fail<T>(error: string): ParseResult<T> {
  return { ok: false, error };
}

/**
 * Validates a departure time typed as H:MM or HH:MM and returns it zero-padded
 */
export function parseClockTime(text: string): ParseResult<string> {
  const minutes = timeToMinutes(text);
  if (minutes === null) {
    return fail('❌ Invalid time format. Use HH:MM (e.g., 13:45).');
  }
  return ok(minutesToTime(minutes));
}

/**
 * Parses one passenger's age (0-120), or the teacher/student designation
 */
export function parsePassengerAge(text: string): ParseResult<PassengerAge> {
  const cleaned = text.trim().toLowerCase();

  if (TEACHER_WORDS.includes(cleaned)) {
    return ok('teacher');
  }

  if (!/^\d{1,3}$/.test(cleaned)) {
    return fail(`❌ Please enter the age as a whole number between ${MIN_AGE} and ${MAX_AGE}.`);
  }

  const age = parseInt(cleaned, 10);
  if (age < MIN_AGE || age > MAX_AGE) {
    return fail(`❌ Age must be between ${MIN_AGE} and ${MAX_AGE}.`);
  }
  return ok(age);
}

/**
 * Parses a passenger count menu value. "7+" counts as 7 but keeps its label.
 */
export function parsePassengerCount(value: string): ParseResult<{ count: number; label: string }> {
  if (value === `${MAX_PASSENGERS}+`) {
    return ok({ count: MAX_PASSENGERS, label: value });
  }

  if (/^[1-6]$/.test(value)) {
    return ok({ count: parseInt(value, 10), label: value });
  }

  return fail('❌ Please choose the number of passengers from the menu.');
}

export function parseSeatCount(text: string): ParseResult<number> {
  const cleaned = text.trim();
  if (!/^\d+$/.test(cleaned)) {
    return fail('❌ Seat count must be a whole number (e.g., 40).');
  }

  const seats = parseInt(cleaned, 10);
  if (seats <= 0 || seats > MAX_SEATS) {
    return fail(`❌ Seat count must be between 1 and ${MAX_SEATS}.`);
  }
  return ok(seats);
}

/**
 * Parses a non-negative price with at most two decimals (e.g., 150 or 150.00)
 */
export function parsePrice(text: string): ParseResult<number> {
  const cleaned = text.trim();
  if (!/^\d+(\.\d{1,2})?$/.test(cleaned)) {
    return fail('❌ Invalid price format. Please enter a number (e.g., 150.00).');
  }
  return ok(Number(cleaned));
}

/**
 * Validates a contact number: optional +, then at least 5 digits, spaces or hyphens
 */
export function parseContact(text: string): ParseResult<string> {
  const cleaned = text.trim();
  if (!/^\+?[\d\s-]{5,}$/.test(cleaned)) {
    return fail('❌ Invalid contact format. Please enter a valid number.');
  }
  return ok(cleaned);
}

export function parseRequiredText(text: string, field: string): ParseResult<string> {
  const cleaned = text.trim();
  if (cleaned.length === 0) {
    return fail(`❌ ${field} cannot be empty.`);
  }
  if (cleaned.length > MAX_TEXT_LENGTH) {
    return fail(`❌ ${field} must be at most ${MAX_TEXT_LENGTH} characters.`);
  }
  return ok(cleaned);
}

export function isSkip(text: string): boolean {
  return SKIP_WORDS.includes(text.trim().toLowerCase());
}
