import { InMemorySpotRepo } from "../infra/inMemoryRepos";
import { Mutex } from "../infra/mutex";
import { createLogger, Logger } from "../infra/logger";
import { VehicleClass, VehicleDto } from "../dtos/vehicle.dto";
import { AlreadyOccupiedError } from "../errors/parkingErrors";
import { ParkingSpot } from "./parkingSpot";

export const DEFAULT_SPOTS_PER_FLOOR = 10;

// all spot table access goes through withSpots
export class ParkingFloor {
  private readonly spots: InMemorySpotRepo;
  private readonly lock = new Mutex();

  constructor(
    readonly id: number,
    defaultSpots = DEFAULT_SPOTS_PER_FLOOR,
    private readonly logger: Logger = createLogger('ParkingFloor', 'warn'),
  ) {
    const initial: ParkingSpot[] = [];
    for (let i = 0; i < defaultSpots; i++) {
      initial.push(new ParkingSpot(true, 'REGULAR', `F${id}-S${i}`));
    }
    this.spots = new InMemorySpotRepo(initial);
  }

  withSpots<T>(fn: (spots: InMemorySpotRepo) => T | Promise<T>): Promise<T> {
    return this.lock.runExclusive(() => fn(this.spots));
  }

  /** Inserts under the spot's id; an existing spot with that id is replaced. */
  async addSpot(spot: ParkingSpot): Promise<void> {
    const replaced = await this.withSpots(spots => spots.add(spot));
    if (replaced) this.logger.warn(`floor ${this.id}: spot ${spot.id} replaced`);
  }

  /** First fit in insertion order: no attempt is made to pick the smallest spot. */
  async findAvailableSpot(vehicleClass: VehicleClass): Promise<string | undefined> {
    return this.withSpots(async spots => {
      const free = await spots.listAvailable();
      return free.find(s => s.compatible(vehicleClass))?.id;
    });
  }

  async hasCompatibleSpot(vehicleClass: VehicleClass): Promise<boolean> {
    return this.withSpots(async spots => (await spots.list()).some(s => s.compatible(vehicleClass)));
  }

  async getSpot(spotId: string): Promise<ParkingSpot | undefined> {
    return this.withSpots(spots => spots.findById(spotId));
  }

  /**
   * Re-checks the spot under the table lock. A spot taken or replaced since
   * it was found surfaces as AlreadyOccupiedError.
   */
  async occupySpot(spotId: string, vehicle: VehicleDto): Promise<void> {
    await this.withSpots(async spots => {
      const spot = await spots.findById(spotId);
      if (!spot) throw new AlreadyOccupiedError(spotId);
      spot.occupy(vehicle);
    });
  }

  /** Returns false when no spot with that id lives on this floor. */
  async vacateSpot(spotId: string): Promise<boolean> {
    return this.withSpots(async spots => {
      const spot = await spots.findById(spotId);
      if (!spot) return false;
      spot.vacate();
      return true;
    });
  }

  async countSpots(): Promise<number> {
    return this.withSpots(spots => spots.count());
  }

  async countOccupied(): Promise<number> {
    return this.withSpots(async spots => (await spots.list()).filter(s => !s.isFree).length);
  }
}
