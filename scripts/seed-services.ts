import { createDatabasePool } from '../src/config/database';
import { env } from '../src/config/env';
import logger from '../src/config/logger';
import { PgBusServiceRepository } from '../src/repositories/pgBusService.repository';
import { BusServiceRegistry } from '../src/services/busService.registry';
import { CreateBusServiceInput } from '../src/types/service';

/**
 * Seeds demo bus services for local testing.
 * Removes previously seeded rows (owner "seed") first so it can be re-run.
 */

const SEED_OWNER = 'seed';

const demoServices: CreateBusServiceInput[] = [
  {
    ownerChatId: SEED_OWNER,
    route: 'Kandy-Colombo',
    serviceName: 'Hill Country Express',
    driverName: 'Sunil',
    vehicleClass: 'AC Coach',
    fareTable: { adult: 150, teacher: 120, child: 75 },
    totalSeats: 40,
    contact: '+94 71 000 0001',
    paymentMethods: ['weekly', 'monthly'],
  },
  {
    ownerChatId: SEED_OWNER,
    route: 'Kandy-Colombo',
    serviceName: 'Morning Shuttle',
    driverName: 'Kamal',
    vehicleClass: null,
    fareTable: { adult: 100 },
    totalSeats: 12,
    contact: '+94 71 000 0002',
    paymentMethods: ['monthly'],
  },
  {
    ownerChatId: SEED_OWNER,
    route: 'Galle-Matara',
    serviceName: 'Coastal Line',
    driverName: 'Nimal',
    vehicleClass: 'Mini Bus',
    fareTable: { adult: 80, child: 40 },
    totalSeats: 25,
    contact: '+94 71 000 0003',
    paymentMethods: [],
  },
];

async function main(): Promise<void> {
  if (!env.DATABASE_URL) {
    throw new Error('DATABASE_URL must be set to seed bus services');
  }

  const pool = createDatabasePool(env.DATABASE_URL);
  try {
    const repository = new PgBusServiceRepository(pool);
    await repository.ensureSchema();

    logger.info('🧹 Removing previously seeded services...');
    await pool.query('DELETE FROM bus_services WHERE owner_chat_id = $1', [SEED_OWNER]);

    const registry = new BusServiceRegistry(repository);
    for (const input of demoServices) {
      const service = await registry.create(input);
      logger.info(`✅ Created: ${service.serviceName} on ${service.route} (ID ${service.id})`);
    }

    logger.info(`🎉 Seed completed: ${demoServices.length} services`);
  } finally {
    await pool.end();
  }
}

main().catch((error: unknown) => {
  logger.error('❌ Seed failed:', { error: error instanceof Error ? error.message : 'Unknown error' });
  process.exit(1);
});
