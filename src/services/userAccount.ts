import { v4 as uuid } from 'uuid';
import { IAccount } from "../interfaces/account";
import { VehicleDto } from "../dtos/vehicle.dto";

export class UserAccount implements IAccount {
  private vehicles = new Map<string, VehicleDto>();

  constructor(readonly name: string, readonly phone: string) {}

  registerVehicle(vehicle: VehicleDto): string {
    const id = uuid();
    this.vehicles.set(id, vehicle);
    return id;
  }

  // Registrations are keyed by id, so removal matches on plate.
  removeVehicle(vehicle: VehicleDto): void {
    for (const [id, v] of this.vehicles) {
      if (v.plate === vehicle.plate) this.vehicles.delete(id);
    }
  }

  getVehicleById(vehicleId: string): VehicleDto | undefined {
    return this.vehicles.get(vehicleId);
  }

  listVehicles(): VehicleDto[] {
    return [...this.vehicles.values()];
  }
}
