import type { ParkingSpot } from "../models/parkingSpot";
import type { ParkingFloor } from "../models/parkingFloor";
import { ParkingTicket } from "../dtos/ticket.dto";

// not synchronised: callers hold the owner's lock
class InMemoryKeyedRepo<K, V> {
  protected readonly items = new Map<K, V>();

  async findById(id: K): Promise<V | undefined> {
    return this.items.get(id);
  }

  /** Returns true when an existing entry was replaced. */
  async put(id: K, value: V): Promise<boolean> {
    const replaced = this.items.has(id);
    this.items.set(id, value);
    return replaced;
  }

  async remove(id: K): Promise<V | undefined> {
    const value = this.items.get(id);
    this.items.delete(id);
    return value;
  }

  async list(): Promise<V[]> {
    return [...this.items.values()];
  }

  async count(): Promise<number> {
    return this.items.size;
  }
}

export class InMemorySpotRepo extends InMemoryKeyedRepo<string, ParkingSpot> {
  constructor(initial: ParkingSpot[] = []) {
    super();
    for (const spot of initial) this.items.set(spot.id, spot);
  }

  async add(spot: ParkingSpot): Promise<boolean> {
    return this.put(spot.id, spot);
  }

  async listAvailable(): Promise<ParkingSpot[]> {
    return [...this.items.values()].filter(s => s.isFree);
  }
}

export class InMemoryFloorRepo extends InMemoryKeyedRepo<number, ParkingFloor> {
  async add(floor: ParkingFloor): Promise<boolean> {
    return this.put(floor.id, floor);
  }
}

export class InMemoryTicketRepo extends InMemoryKeyedRepo<string, ParkingTicket> {
  async create(ticket: ParkingTicket): Promise<void> {
    await this.put(ticket.id, ticket);
  }
}
