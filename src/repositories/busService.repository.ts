import {
  BusService,
  BusServiceFilter,
  CreateBusServiceInput,
  SeatDecrementResult,
  ServiceStatus,
} from '../types/service';

/**
 * Storage contract for bus services.
 * decrementSeats must check and write as one atomic step per service.
 */
export interface BusServiceRepository {
  insert(input: CreateBusServiceInput): Promise<BusService>;
  findAll(filter?: BusServiceFilter): Promise<BusService[]>;
  findById(id: string): Promise<BusService | null>;
  updateStatus(id: string, status: ServiceStatus): Promise<BusService | null>;
  toggleStatus(id: string): Promise<BusService | null>;
  decrementSeats(id: string, seats: number): Promise<SeatDecrementResult>;
}
