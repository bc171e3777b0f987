import { ParkingCharge } from "../dtos/ticket.dto";

export interface IFeeCalculator {
  calculate(entryTime: Date, exitTime: Date): ParkingCharge;
}
