import logger from '../config/logger';
import { BusServiceRepository } from '../repositories/busService.repository';
import {
  BusService,
  BusServiceFilter,
  CreateBusServiceInput,
  SeatDecrementResult,
  ServiceStatus,
} from '../types/service';
import { AppError } from '../utils/AppError';

/**
 * BusServiceRegistry is the provider-owned catalog of bookable services.
 * Field validation happens in the conversation; the registry guards the seat invariant.
 */
export class BusServiceRegistry {
  constructor(private readonly repository: BusServiceRepository) {}

  async create(input: CreateBusServiceInput): Promise<BusService> {
    if (!Number.isInteger(input.totalSeats) || input.totalSeats <= 0) {
      throw new AppError(`Total seats must be a positive integer, got ${input.totalSeats}`, 400);
    }

    const service = await this.repository.insert(input);
    logger.info(`Bus service created: id=${service.id}, route=${service.route}, seats=${service.totalSeats}`, {
      ownerChatId: service.ownerChatId,
    });
    return service;
  }

  async listAll(filter?: BusServiceFilter): Promise<BusService[]> {
    return this.repository.findAll(filter);
  }

  async getById(id: string): Promise<BusService | null> {
    return this.repository.findById(id);
  }

  /**
   * Routes of services passengers can currently book
   */
  async activeRouteNames(): Promise<string[]> {
    const services = await this.repository.findAll({ status: 'active' });
    return [...new Set(services.map((service) => service.route))].sort();
  }

  async setStatus(id: string, status: ServiceStatus): Promise<BusService> {
    const service = await this.repository.updateStatus(id, status);
    if (!service) {
      throw new AppError(`Bus service ${id} not found`, 404);
    }
    logger.info(`Bus service ${id} status set to ${status}`);
    return service;
  }

  /**
   * Flips active ⇄ unavailable in a single write
   */
  async toggleStatus(id: string): Promise<BusService> {
    const service = await this.repository.toggleStatus(id);
    if (!service) {
      throw new AppError(`Bus service ${id} not found`, 404);
    }
    logger.info(`Bus service ${id} status toggled to ${service.status}`);
    return service;
  }

  /**
   * Atomically takes `seats` seats from a service. Fails without change when fewer remain
   * or the service is not active.
   */
  async decrementSeats(id: string, seats: number): Promise<SeatDecrementResult> {
    if (!Number.isInteger(seats) || seats <= 0) {
      throw new AppError(`Seat count to book must be a positive integer, got ${seats}`, 400);
    }

    const result = await this.repository.decrementSeats(id, seats);
    if (result.ok) {
      logger.info(`Booked ${seats} seat(s) on service ${id}, ${result.service.remainingSeats} remaining`);
    } else {
      logger.info(`Seat booking on service ${id} rejected: ${result.reason}`, { seats });
    }
    return result;
  }
}
