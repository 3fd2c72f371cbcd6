import {
  BusService,
  BusServiceFilter,
  CreateBusServiceInput,
  SeatDecrementResult,
  ServiceStatus,
} from '../types/service';
import { BusServiceRepository } from './busService.repository';

function copy(service: BusService): BusService {
  return {
    ...service,
    fareTable: { ...service.fareTable },
    paymentMethods: [...service.paymentMethods],
    createdAt: new Date(service.createdAt.getTime()),
  };
}

/**
 * Process-local repository, used when no DATABASE_URL is configured and in tests.
 * Mutations never await between reading and writing a service.
 */
export class InMemoryBusServiceRepository implements BusServiceRepository {
  private readonly services = new Map<string, BusService>();
  private sequence = 0;

  async insert(input: CreateBusServiceInput): Promise<BusService> {
    this.sequence += 1;
    const service: BusService = {
      ...input,
      id: String(this.sequence),
      fareTable: { ...input.fareTable },
      paymentMethods: [...input.paymentMethods],
      remainingSeats: input.totalSeats,
      status: 'active',
      createdAt: new Date(),
    };
    this.services.set(service.id, service);
    return copy(service);
  }

  async findAll(filter: BusServiceFilter = {}): Promise<BusService[]> {
    return [...this.services.values()]
      .filter((service) => filter.route === undefined || service.route === filter.route)
      .filter((service) => filter.status === undefined || service.status === filter.status)
      .filter((service) => filter.ownerChatId === undefined || service.ownerChatId === filter.ownerChatId)
      .map(copy);
  }

  async findById(id: string): Promise<BusService | null> {
    const service = this.services.get(id);
    return service ? copy(service) : null;
  }

  async updateStatus(id: string, status: ServiceStatus): Promise<BusService | null> {
    const service = this.services.get(id);
    if (!service) {
      return null;
    }
    service.status = status;
    return copy(service);
  }

  async toggleStatus(id: string): Promise<BusService | null> {
    const service = this.services.get(id);
    if (!service) {
      return null;
    }
    service.status = service.status === 'active' ? 'unavailable' : 'active';
    return copy(service);
  }

  async decrementSeats(id: string, seats: number): Promise<SeatDecrementResult> {
    const service = this.services.get(id);
    if (!service) {
      return { ok: false, reason: 'notFound' };
    }
    if (service.status !== 'active') {
      return { ok: false, reason: 'unavailable' };
    }
    if (service.remainingSeats < seats) {
      return { ok: false, reason: 'insufficientSeats' };
    }
    service.remainingSeats -= seats;
    return { ok: true, service: copy(service) };
  }
}
