import { config as loadEnv } from 'dotenv';
import { loadConfig } from "./config";
import { createLogger } from "./infra/logger";
import { SequenceGenerator } from "./infra/sequence";
import { ParkingFloor } from "./models/parkingFloor";
import { ParkingSpot } from "./models/parkingSpot";
import { ParkingLot } from "./services/parkingLot";
import { ParkingService } from "./services/parkingService";
import { HourlyFeeCalculator } from "./services/hourlyFeeCalculator";
import { UserAccount } from "./services/userAccount";
import { DisplayBoard } from "./dtos/displayBoard.dto";

export * from "./dtos/vehicle.dto";
export * from "./dtos/spot.dto";
export * from "./dtos/ticket.dto";
export * from "./dtos/displayBoard.dto";
export * from "./errors/parkingErrors";
export { loadConfig } from "./config";
export type { ParkingConfig } from "./config";
export { ParkingFloor } from "./models/parkingFloor";
export { ParkingSpot } from "./models/parkingSpot";
export { ParkingLot } from "./services/parkingLot";
export type { ParkingLotOptions } from "./services/parkingLot";
export { ParkingService } from "./services/parkingService";
export { HourlyFeeCalculator, chargeFor } from "./services/hourlyFeeCalculator";
export { UserAccount } from "./services/userAccount";
export { SequenceGenerator } from "./infra/sequence";

async function demo() {
  loadEnv();
  const config = loadConfig();
  const log = createLogger('demo', config.logLevel);

  const lot = new ParkingLot('Harbour Street Garage', '12 Harbour Street', undefined, {
    ticketIds: new SequenceGenerator(config.ticketPrefix),
    feeCalculator: new HourlyFeeCalculator(config.ratePerHour),
    logger: createLogger('ParkingLot', config.logLevel),
  });

  for (let i = 1; i <= 5; i++) {
    await lot.addFloor(new ParkingFloor(i, config.defaultSpotsPerFloor));
  }
  // Trucks go on the ground floor.
  const ground = await lot.getFloorById(1);
  for (let i = 0; i < 5; i++) {
    await ground?.addSpot(new ParkingSpot(true, 'LARGE'));
  }

  const show = (board: DisplayBoard) =>
    log.info(`${board.numFloors} floors, ${board.numFreeSpots}/${board.numTotalSpots} free, ${board.numParkedVehicles} parked`);
  show(await lot.displayInfo());

  const user = new UserAccount('Sam', '555-0100');
  const ids = [
    user.registerVehicle({ type: 'COMPACT', model: 'Corolla', plate: 'ABC123' }),
    user.registerVehicle({ type: 'HEAVY', model: 'Actros', plate: 'XYZ789' }),
    user.registerVehicle({ type: 'LIGHT', model: 'Vespa', plate: 'DEF456' }),
  ];

  const service = new ParkingService(lot, createLogger('ParkingService', config.logLevel));
  const tickets: string[] = [];
  for (const id of ids) {
    const res = await service.checkInRegistered(user, id);
    if (res.ok) tickets.push(res.ticketId);
  }
  show(await lot.displayInfo());

  const last = tickets[tickets.length - 1];
  if (last !== undefined) {
    const out = await service.checkOut(last);
    if (out.ok) log.info(`charged ${out.total}, chargeback ${out.chargeback}`);
  }
  await service.checkOut('TKT_missing');
  show(await lot.displayInfo());
}

if (require.main === module) {
  demo().catch(err => console.error(err));
}
