import { v4 as uuid } from 'uuid';
import { IParkable } from "../interfaces/parkable";
import { IFeeCalculator } from "../interfaces/feeCalculator";
import { InMemoryFloorRepo, InMemoryTicketRepo } from "../infra/inMemoryRepos";
import { Mutex } from "../infra/mutex";
import { SequenceGenerator } from "../infra/sequence";
import { Clock, systemClock } from "../infra/clock";
import { createLogger, Logger } from "../infra/logger";
import { ParkingFloor } from "../models/parkingFloor";
import { ParkingCharge, ParkingTicket } from "../dtos/ticket.dto";
import { VehicleDto } from "../dtos/vehicle.dto";
import { DisplayBoard } from "../dtos/displayBoard.dto";
import { AlreadyOccupiedError, IncompatibleClassError, InvalidTicketError, NoAvailableSpotError } from "../errors/parkingErrors";
import { HourlyFeeCalculator } from "./hourlyFeeCalculator";

export interface ParkingLotOptions {
  ticketIds?: SequenceGenerator;
  feeCalculator?: IFeeCalculator;
  clock?: Clock;
  logger?: Logger;
}

interface SpotMatch {
  floorId: number;
  spotId: string;
}

function copyTicket(ticket: ParkingTicket): ParkingTicket {
  return {
    ...ticket,
    vehicle: { ...ticket.vehicle },
    entryTime: new Date(ticket.entryTime.getTime()),
    exitTime: ticket.exitTime && new Date(ticket.exitTime.getTime()),
  };
}

/**
 * Owns the floor table and the ticket table, each behind its own lock.
 *
 * Lock order is floor table first, then a floor's spot table (taken inside
 * ParkingFloor). The ticket lock is never held together with either.
 *
 * Allocation holds the floor lock across scan and occupy, so concurrent
 * parks never race for the same spot. The occupy still re-checks under the
 * spot lock: callers going through a floor directly (addSpot, or their own
 * findAvailableSpot + occupySpot) get AlreadyOccupiedError on a lost race.
 */
export class ParkingLot implements IParkable {
  private readonly floors = new InMemoryFloorRepo();
  private readonly tickets = new InMemoryTicketRepo();
  private readonly floorLock = new Mutex();
  private readonly ticketLock = new Mutex();

  private readonly ticketIds: SequenceGenerator;
  private readonly feeCalculator: IFeeCalculator;
  private readonly clock: Clock;
  private readonly logger: Logger;

  constructor(
    readonly name: string,
    readonly address: string,
    readonly uid: string = uuid(),
    options: ParkingLotOptions = {},
  ) {
    this.ticketIds = options.ticketIds ?? new SequenceGenerator('TKT_');
    this.feeCalculator = options.feeCalculator ?? new HourlyFeeCalculator();
    this.clock = options.clock ?? systemClock;
    this.logger = options.logger ?? createLogger('ParkingLot');
  }

  async addFloor(floor: ParkingFloor): Promise<void> {
    const replaced = await this.floorLock.runExclusive(() => this.floors.add(floor));
    if (replaced) this.logger.warn(`floor ${floor.id} replaced`);
  }

  /** The live floor, not a copy: spots added to it join the lot. */
  async getFloorById(id: number): Promise<ParkingFloor | undefined> {
    return this.floorLock.runExclusive(() => this.floors.findById(id));
  }

  async parkVehicle(vehicle: VehicleDto): Promise<ParkingTicket> {
    const { floorId, spotId } = await this.floorLock.runExclusive(async () => {
      const match = await this.scan(vehicle);
      const floor = await this.floors.findById(match.floorId);
      if (!floor) throw new AlreadyOccupiedError(match.spotId);
      await floor.occupySpot(match.spotId, vehicle);
      return match;
    });

    const ticket: ParkingTicket = {
      id: this.ticketIds.next(),
      vehicle: { ...vehicle },
      spotId,
      entryTime: this.clock.now(),
      exitTime: null,
      paymentStatus: 'PENDING',
    };
    await this.ticketLock.runExclusive(() => this.tickets.create(ticket));

    this.logger.info(`vehicle ${vehicle.plate} parked at ${spotId} (floor ${floorId}), ticket ${ticket.id}`);
    return copyTicket(ticket);
  }

  async unparkVehicle(ticketId: string): Promise<ParkingCharge> {
    const ticket = await this.ticketLock.runExclusive(async () => {
      const found = await this.tickets.findById(ticketId);
      if (!found) throw new InvalidTicketError(ticketId);
      if (found.exitTime) throw new InvalidTicketError(ticketId, 'already released');
      await this.tickets.remove(ticketId);
      return found;
    });

    const vacated = await this.floorLock.runExclusive(async () => {
      for (const floor of await this.floors.list()) {
        if (await floor.vacateSpot(ticket.spotId)) return true;
      }
      return false;
    });
    if (!vacated) this.logger.warn(`spot ${ticket.spotId} for ticket ${ticketId} not found on any floor`);

    const exitTime = this.clock.now();
    const charge = this.feeCalculator.calculate(ticket.entryTime, exitTime);
    ticket.exitTime = exitTime;
    ticket.paymentStatus = 'SUCCEEDED';
    await this.ticketLock.runExclusive(() => this.tickets.create(ticket));

    this.logger.info(`vehicle ${ticket.vehicle.plate} left ${ticket.spotId}, charged ${charge.total.toFixed(2)}`);
    return charge;
  }

  /** Open and completed tickets alike; completed ones are kept as records. */
  async getTicket(ticketId: string): Promise<ParkingTicket | undefined> {
    const ticket = await this.ticketLock.runExclusive(() => this.tickets.findById(ticketId));
    return ticket && copyTicket(ticket);
  }

  async displayInfo(): Promise<DisplayBoard> {
    return this.floorLock.runExclusive(async () => {
      const floors = await this.floors.list();
      let total = 0;
      let occupied = 0;
      for (const floor of floors) {
        total += await floor.countSpots();
        occupied += await floor.countOccupied();
      }
      return {
        uid: this.uid,
        name: this.name,
        address: this.address,
        numFloors: floors.length,
        numTotalSpots: total,
        numFreeSpots: total - occupied,
        numParkedVehicles: occupied,
      };
    });
  }

  // Runs under the floor lock.
  private async scan(vehicle: VehicleDto): Promise<SpotMatch> {
    const floors = await this.floors.list();
    for (const floor of floors) {
      const spotId = await floor.findAvailableSpot(vehicle.type);
      if (spotId !== undefined) return { floorId: floor.id, spotId };
    }

    let anySpots = false;
    for (const floor of floors) {
      if (await floor.hasCompatibleSpot(vehicle.type)) throw new NoAvailableSpotError(vehicle.type);
      if ((await floor.countSpots()) > 0) anySpots = true;
    }
    throw anySpots ? new IncompatibleClassError(vehicle.type) : new NoAvailableSpotError(vehicle.type);
  }
}
