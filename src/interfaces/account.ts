import { VehicleDto } from "../dtos/vehicle.dto";

export interface IAccount {
  registerVehicle(vehicle: VehicleDto): string;
  removeVehicle(vehicle: VehicleDto): void;
  getVehicleById(vehicleId: string): VehicleDto | undefined;
}
