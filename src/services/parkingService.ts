import { IParkable } from "../interfaces/parkable";
import { IAccount } from "../interfaces/account";
import { VehicleDto } from "../dtos/vehicle.dto";
import { isParkingError, ParkingErrorKind } from "../errors/parkingErrors";
import { createLogger, Logger } from "../infra/logger";

export interface Failure {
  ok: false;
  error: ParkingErrorKind | 'InvalidVehicle';
  message: string;
}

export type CheckInResult = { ok: true; ticketId: string; spotId: string } | Failure;
export type CheckOutResult = { ok: true; total: number; chargeback: number } | Failure;

/**
 * Caller-facing wrapper around a lot. Parking errors come back as failure
 * values and are logged; anything else is rethrown.
 */
export class ParkingService {
  constructor(private lot: IParkable, private logger: Logger = createLogger('ParkingService')) {}

  async checkIn(vehicle: VehicleDto): Promise<CheckInResult> {
    try {
      const ticket = await this.lot.parkVehicle(vehicle);
      return { ok: true, ticketId: ticket.id, spotId: ticket.spotId };
    } catch (err) {
      return this.fail(err, `check-in of ${vehicle.plate}`);
    }
  }

  async checkInRegistered(account: IAccount, vehicleId: string): Promise<CheckInResult> {
    const vehicle = account.getVehicleById(vehicleId);
    if (!vehicle) {
      const message = `No vehicle registered under ${vehicleId}`;
      this.logger.error(message);
      return { ok: false, error: 'InvalidVehicle', message };
    }
    return this.checkIn(vehicle);
  }

  async checkOut(ticketId: string): Promise<CheckOutResult> {
    try {
      const charge = await this.lot.unparkVehicle(ticketId);
      return { ok: true, total: charge.total, chargeback: charge.chargeback };
    } catch (err) {
      return this.fail(err, `check-out of ${ticketId}`);
    }
  }

  private fail(err: unknown, action: string): Failure {
    if (!isParkingError(err)) throw err;
    this.logger.error(`${action} failed: ${err.message}`);
    return { ok: false, error: err.kind, message: err.message };
  }
}
