import { ParkingCharge, ParkingTicket } from "../dtos/ticket.dto";
import { VehicleDto } from "../dtos/vehicle.dto";

export interface IParkable {
  parkVehicle(vehicle: VehicleDto): Promise<ParkingTicket>;
  unparkVehicle(ticketId: string): Promise<ParkingCharge>;
}
