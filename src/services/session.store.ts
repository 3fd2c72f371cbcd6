import { z } from 'zod';
import logger from '../config/logger';
import { PAYMENT_METHODS } from '../types/service';
import { ConversationStep, Session } from '../types/session';
import { AppError } from '../utils/AppError';

const SESSION_KEY_PREFIX = 'session:';

/**
 * Durable per-chat session storage. Last write wins per chat id.
 */
export interface SessionStore {
  get(chatId: string): Promise<Session | null>;
  set(session: Session): Promise<void>;
  delete(chatId: string): Promise<void>;
}

/**
 * The commands RedisSessionStore uses; satisfied by an ioredis client
 */
export interface SessionRedisClient {
  get(key: string): Promise<string | null>;
  setex(key: string, seconds: number, value: string): Promise<unknown>;
  del(key: string): Promise<number>;
}

const offerSchema = z.discriminatedUnion('kind', [
  z.object({
    kind: z.literal('schedule'),
    id: z.string(),
    label: z.string(),
    fare: z.number(),
    entryId: z.string(),
    routeName: z.string(),
    departureTimes: z.array(z.string()),
  }),
  z.object({
    kind: z.literal('service'),
    id: z.string(),
    label: z.string(),
    fare: z.number(),
    serviceId: z.string(),
    serviceName: z.string(),
    contact: z.string(),
    paymentMethods: z.array(z.enum(PAYMENT_METHODS)),
  }),
]);

const sessionSchema = z.object({
  id: z.string(),
  step: z.nativeEnum(ConversationStep),
  role: z.enum(['unset', 'passenger', 'provider']),
  answers: z.object({
    route: z.string().optional(),
    passengerCount: z.number().int().optional(),
    passengerCountLabel: z.string().optional(),
    passengers: z.array(z.union([z.number().int(), z.literal('teacher')])).optional(),
    time: z.string().optional(),
    scheduleFare: z.number().optional(),
    menuPage: z.number().int().nonnegative().optional(),
    providerAuthenticated: z.boolean().optional(),
    draft: z
      .object({
        route: z.string().optional(),
        serviceName: z.string().optional(),
        driverName: z.string().optional(),
        vehicleClass: z.string().nullable().optional(),
        totalSeats: z.number().int().optional(),
        fares: z
          .object({
            adult: z.number().optional(),
            teacher: z.number().optional(),
            child: z.number().optional(),
          })
          .optional(),
        contact: z.string().optional(),
        paymentMethods: z.array(z.enum(PAYMENT_METHODS)).optional(),
      })
      .optional(),
  }),
  offers: z.array(offerSchema),
  createdAt: z.string(),
  updatedAt: z.string(),
});

/**
 * Parses a stored session. Returns null for anything that is not a valid session.
 */
export function deserializeSession(raw: string): Session | null {
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch {
    return null;
  }
  const result = sessionSchema.safeParse(parsed);
  return result.success ? result.data : null;
}

/**
 * RedisSessionStore keeps sessions as JSON with a sliding TTL.
 * Redis failures surface as AppError 503: the caller must not report the step as done.
 */
export class RedisSessionStore implements SessionStore {
  constructor(
    private readonly client: SessionRedisClient,
    private readonly ttlSeconds: number
  ) {}

  private key(chatId: string): string {
    return `${SESSION_KEY_PREFIX}${chatId}`;
  }

  async get(chatId: string): Promise<Session | null> {
    let raw: string | null;
    try {
      raw = await this.client.get(this.key(chatId));
    } catch (error) {
      throw AppError.persistence('session read', error);
    }

    if (raw === null) {
      return null;
    }

    const session = deserializeSession(raw);
    if (!session) {
      logger.warn(`Discarding unreadable session for chat ${chatId}`);
      await this.delete(chatId);
    }
    return session;
  }

  async set(session: Session): Promise<void> {
    try {
      await this.client.setex(this.key(session.id), this.ttlSeconds, JSON.stringify(session));
      logger.debug(`Session saved in Redis for ${session.id}: step=${session.step}`);
    } catch (error) {
      throw AppError.persistence('session write', error);
    }
  }

  async delete(chatId: string): Promise<void> {
    try {
      await this.client.del(this.key(chatId));
      logger.debug(`Session deleted in Redis for ${chatId}`);
    } catch (error) {
      throw AppError.persistence('session delete', error);
    }
  }
}

/**
 * Process-local sessions with the same TTL semantics. Not durable across restarts.
 */
export class InMemorySessionStore implements SessionStore {
  private readonly sessions = new Map<string, { session: Session; expiresAt: number }>();

  constructor(private readonly ttlSeconds: number = 3600) {}

  private cleanupExpired(): void {
    const now = Date.now();
    for (const [key, value] of this.sessions.entries()) {
      if (value.expiresAt < now) {
        this.sessions.delete(key);
      }
    }
  }

  async get(chatId: string): Promise<Session | null> {
    this.cleanupExpired();
    const stored = this.sessions.get(chatId);
    return stored ? structuredClone(stored.session) : null;
  }

  async set(session: Session): Promise<void> {
    this.sessions.set(session.id, {
      session: structuredClone(session),
      expiresAt: Date.now() + this.ttlSeconds * 1000,
    });
  }

  async delete(chatId: string): Promise<void> {
    this.sessions.delete(chatId);
  }
}
