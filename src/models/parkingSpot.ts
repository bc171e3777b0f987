import { v4 as uuid } from 'uuid';
import { COMPATIBILITY, SpotClass, SpotSnapshot } from "../dtos/spot.dto";
import { VehicleClass, VehicleDto } from "../dtos/vehicle.dto";
import { AlreadyOccupiedError, IncompatibleClassError } from "../errors/parkingErrors";

/**
 * Smallest allocatable unit. A spot created with `isFree = false` is held
 * out of service: it reads as occupied, with no vehicle, until vacated.
 */
export class ParkingSpot {
  private free: boolean;
  private vehicle?: VehicleDto;

  constructor(isFree = true, readonly spotClass: SpotClass = 'REGULAR', readonly id: string = uuid()) {
    this.free = isFree;
  }

  get isFree(): boolean {
    return this.free;
  }

  get occupant(): VehicleDto | undefined {
    return this.vehicle;
  }

  compatible(vehicleClass: VehicleClass): boolean {
    return COMPATIBILITY[vehicleClass][this.spotClass];
  }

  occupy(vehicle: VehicleDto): void {
    if (!this.free) throw new AlreadyOccupiedError(this.id);
    if (!this.compatible(vehicle.type)) throw new IncompatibleClassError(vehicle.type, this.spotClass);
    this.vehicle = vehicle;
    this.free = false;
  }

  vacate(): void {
    this.vehicle = undefined;
    this.free = true;
  }

  snapshot(): SpotSnapshot {
    return {
      id: this.id,
      spotClass: this.spotClass,
      isFree: this.free,
      ...(this.vehicle ? { vehicle: { ...this.vehicle } } : {}),
    };
  }
}
