export type ParkingErrorKind = 'NoAvailableSpot' | 'AlreadyOccupied' | 'IncompatibleClass' | 'InvalidTicket';

export class ParkingError extends Error {
  constructor(readonly kind: ParkingErrorKind, message: string) {
    super(message);
    this.name = new.target.name;
  }
}

export class NoAvailableSpotError extends ParkingError {
  constructor(vehicleClass: string) {
    super('NoAvailableSpot', `No available spot for a ${vehicleClass} vehicle`);
  }
}

export class AlreadyOccupiedError extends ParkingError {
  constructor(readonly spotId: string) {
    super('AlreadyOccupied', `Spot ${spotId} is already occupied`);
  }
}

export class IncompatibleClassError extends ParkingError {
  constructor(vehicleClass: string, spotClass?: string) {
    super(
      'IncompatibleClass',
      spotClass
        ? `A ${vehicleClass} vehicle cannot use a ${spotClass} spot`
        : `No spot in the lot admits a ${vehicleClass} vehicle`,
    );
  }
}

export class InvalidTicketError extends ParkingError {
  constructor(readonly ticketId: string, reason = 'unknown ticket') {
    super('InvalidTicket', `Invalid ticket ${ticketId}: ${reason}`);
  }
}

export class ConfigError extends Error {
  constructor(readonly issues: string[]) {
    super(`Invalid configuration: ${issues.join('; ')}`);
    this.name = 'ConfigError';
  }
}

export function isParkingError(err: unknown): err is ParkingError {
  return err instanceof ParkingError;
}
