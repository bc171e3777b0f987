import { VehicleDto } from "./vehicle.dto";

export type PaymentStatus = 'PENDING' | 'SUCCEEDED' | 'FAILED';

export interface ParkingTicket {
  id: string;
  vehicle: VehicleDto;
  spotId: string;
  entryTime: Date;
  exitTime: Date | null;
  paymentStatus: PaymentStatus;
}

export interface ParkingCharge {
  total: number;
  chargeback: number;
}
