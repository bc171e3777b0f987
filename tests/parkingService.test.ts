import { ParkingService } from "../src/services/parkingService";
import { ParkingLot } from "../src/services/parkingLot";
import { UserAccount } from "../src/services/userAccount";
import { ParkingFloor } from "../src/models/parkingFloor";
import { IParkable } from "../src/interfaces/parkable";
import { silentLogger } from "./helpers";

async function setup() {
  const lot = new ParkingLot('L', 'A', 'u', { logger: silentLogger });
  await lot.addFloor(new ParkingFloor(1, 1, silentLogger));
  const error = jest.fn();
  const service = new ParkingService(lot, { ...silentLogger, error });
  return { lot, service, error };
}

test('check-in and check-out return plain results', async () => {
  const { service } = await setup();

  const checkIn = await service.checkIn({ type: 'COMPACT', model: 'Fiesta', plate: 'P-1' });
  expect(checkIn).toEqual({ ok: true, ticketId: 'TKT_0', spotId: 'F1-S0' });

  const checkOut = await service.checkOut('TKT_0');
  expect(checkOut).toEqual({ ok: true, total: 0, chargeback: 0 });
});

test('parking errors come back as failures and are logged', async () => {
  const { service, error } = await setup();
  await service.checkIn({ type: 'COMPACT', model: 'Fiesta', plate: 'P-1' });

  expect(await service.checkIn({ type: 'LIGHT', model: 'Vespa', plate: 'P-2' })).toEqual({
    ok: false,
    error: 'NoAvailableSpot',
    message: 'No available spot for a LIGHT vehicle',
  });
  expect(await service.checkIn({ type: 'HEAVY', model: 'Actros', plate: 'P-3' })).toEqual({
    ok: false,
    error: 'IncompatibleClass',
    message: 'No spot in the lot admits a HEAVY vehicle',
  });
  expect(await service.checkOut('x')).toEqual({
    ok: false,
    error: 'InvalidTicket',
    message: 'Invalid ticket x: unknown ticket',
  });
  expect(error).toHaveBeenCalledTimes(3);
  expect(error).toHaveBeenLastCalledWith('check-out of x failed: Invalid ticket x: unknown ticket');
});

test('registered vehicles are looked up before parking', async () => {
  const { service, lot } = await setup();
  const account = new UserAccount('Alex', '555-0101');
  const id = account.registerVehicle({ type: 'LIGHT', model: 'Vespa', plate: 'B-1' });

  expect(await service.checkInRegistered(account, id)).toEqual({ ok: true, ticketId: 'TKT_0', spotId: 'F1-S0' });
  expect((await lot.getTicket('TKT_0'))?.vehicle.plate).toBe('B-1');

  expect(await service.checkInRegistered(account, 'nope')).toEqual({
    ok: false,
    error: 'InvalidVehicle',
    message: 'No vehicle registered under nope',
  });
});

test('other errors are rethrown', async () => {
  const broken: IParkable = {
    parkVehicle: () => Promise.reject(new Error('boom')),
    unparkVehicle: () => Promise.reject(new Error('boom')),
  };
  const service = new ParkingService(broken, silentLogger);

  await expect(service.checkIn({ type: 'COMPACT', model: 'm', plate: 'p' })).rejects.toThrow('boom');
  await expect(service.checkOut('TKT_0')).rejects.toThrow('boom');
});
