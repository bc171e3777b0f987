import { IFeeCalculator } from "../interfaces/feeCalculator";
import { ParkingCharge } from "../dtos/ticket.dto";

const HOUR_MS = 60 * 60_000;

export const DEFAULT_RATE_PER_HOUR = 10;

/** Whole hours only: a 119 minute stay bills one hour. */
export function chargeFor(entryTime: Date, exitTime: Date, ratePerHour: number): number {
  const elapsed = Math.max(0, exitTime.getTime() - entryTime.getTime());
  return Math.floor(elapsed / HOUR_MS) * ratePerHour;
}

export class HourlyFeeCalculator implements IFeeCalculator {
  constructor(private readonly ratePerHour = DEFAULT_RATE_PER_HOUR) {}

  calculate(entryTime: Date, exitTime: Date): ParkingCharge {
    return { total: chargeFor(entryTime, exitTime, this.ratePerHour), chargeback: 0 };
  }
}
