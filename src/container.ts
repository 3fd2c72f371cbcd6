import Redis from 'ioredis';
import { Pool } from 'pg';
import { createDatabasePool, testConnection } from './config/database';
import { Env, env } from './config/env';
import logger from './config/logger';
import { createRedisClient } from './config/redis';
import { WhatsAppController } from './controllers/whatsapp.controller';
import { ConversationHandler } from './handlers/conversation.handler';
import { BusServiceRepository } from './repositories/busService.repository';
import { InMemoryBusServiceRepository } from './repositories/inMemoryBusService.repository';
import { PgBusServiceRepository } from './repositories/pgBusService.repository';
import { BusServiceRegistry } from './services/busService.registry';
import { FareService } from './services/fare.service';
import { RemoteFarePredictor } from './services/farePredictor.client';
import { ScheduleIndex } from './services/schedule.service';
import { InMemorySessionStore, RedisSessionStore, SessionStore } from './services/session.store';
import { loadTimetable } from './services/timetable.loader';
import { WhatsAppService } from './services/whatsapp.service';

export interface HealthReport {
  database: 'connected' | 'disconnected' | 'in-memory';
  sessions: 'connected' | 'disconnected' | 'in-memory';
  scheduleEntries: number;
}

export interface Container {
  conversationHandler: ConversationHandler;
  whatsappController: WhatsAppController;
  registry: BusServiceRegistry;
  schedule: ScheduleIndex;
  health(): Promise<HealthReport>;
  close(): Promise<void>;
}

async function createServiceRepository(pool: Pool | null): Promise<BusServiceRepository> {
  if (!pool) {
    logger.warn('DATABASE_URL not set: bus services are kept in memory and lost on restart');
    return new InMemoryBusServiceRepository();
  }

  const repository = new PgBusServiceRepository(pool);
  if (await testConnection(pool)) {
    await repository.ensureSchema();
  }
  return repository;
}

function createSessionStore(config: Env, redis: Redis | null): SessionStore {
  if (!redis) {
    logger.warn('REDIS_URL not set: sessions are kept in memory and lost on restart');
    return new InMemorySessionStore(config.SESSION_TTL_SECONDS);
  }
  return new RedisSessionStore(redis, config.SESSION_TTL_SECONDS);
}

/**
 * Wires configuration, stores and services into the conversation engine
 */
export async function createContainer(config: Env = env): Promise<Container> {
  const pool = config.DATABASE_URL ? createDatabasePool(config.DATABASE_URL) : null;
  const redis = config.REDIS_URL ? createRedisClient(config.REDIS_URL) : null;

  const registry = new BusServiceRegistry(await createServiceRepository(pool));
  const sessions = createSessionStore(config, redis);
  const schedule = ScheduleIndex.build(loadTimetable(config.TIMETABLE_CSV_PATH), config.DEPARTURE_INTERVAL_MINUTES);

  const predictor = config.FARE_PREDICTOR_URL
    ? new RemoteFarePredictor(config.FARE_PREDICTOR_URL, config.FARE_PREDICTOR_TIMEOUT_MS)
    : undefined;
  const fares = new FareService(predictor, config.FARE_PREDICTOR_TIMEOUT_MS);

  const conversationHandler = new ConversationHandler({
    sessions,
    registry,
    schedule,
    fares,
    providerPassword: config.PROVIDER_PASSWORD,
  });

  const whatsapp = new WhatsAppService({
    apiVersion: config.WA_API_VERSION,
    phoneNumberId: config.WA_PHONE_NUMBER_ID,
    accessToken: config.WA_ACCESS_TOKEN,
  });
  const whatsappController = new WhatsAppController(conversationHandler, whatsapp, config.WA_VERIFY_TOKEN);

  return {
    conversationHandler,
    whatsappController,
    registry,
    schedule,

    async health(): Promise<HealthReport> {
      const database = pool ? ((await testConnection(pool)) ? 'connected' : 'disconnected') : 'in-memory';

      let sessionState: HealthReport['sessions'] = 'in-memory';
      if (redis) {
        try {
          await redis.ping();
          sessionState = 'connected';
        } catch {
          sessionState = 'disconnected';
        }
      }

      return { database, sessions: sessionState, scheduleEntries: schedule.size };
    },

    async close(): Promise<void> {
      if (redis) {
        await redis.quit();
      }
      if (pool) {
        await pool.end();
      }
      logger.info('Connections closed');
    },
  };
}
