import { ParkingSpot } from "../src/models/parkingSpot";
import { COMPATIBILITY, SPOT_CLASSES } from "../src/dtos/spot.dto";
import { VEHICLE_CLASSES, VehicleDto } from "../src/dtos/vehicle.dto";
import { AlreadyOccupiedError, IncompatibleClassError } from "../src/errors/parkingErrors";

const car: VehicleDto = { type: 'COMPACT', model: 'Corolla', plate: 'CAR-1' };
const bike: VehicleDto = { type: 'LIGHT', model: 'Vespa', plate: 'BIKE-1' };

test('compatibility table covers every vehicle and spot pair', () => {
  for (const v of VEHICLE_CLASSES) {
    for (const s of SPOT_CLASSES) {
      expect(typeof COMPATIBILITY[v][s]).toBe('boolean');
    }
  }
});

test('occupy succeeds only for pairs the table admits', () => {
  for (const type of VEHICLE_CLASSES) {
    for (const spotClass of SPOT_CLASSES) {
      const spot = new ParkingSpot(true, spotClass, 's');
      const vehicle: VehicleDto = { type, model: 'm', plate: 'p' };
      if (COMPATIBILITY[type][spotClass]) {
        spot.occupy(vehicle);
        expect(spot.isFree).toBe(false);
      } else {
        expect(() => spot.occupy(vehicle)).toThrow(IncompatibleClassError);
        expect(spot.isFree).toBe(true);
        expect(spot.occupant).toBeUndefined();
      }
    }
  }
});

test('trucks are kept out of regular spots', () => {
  const spot = new ParkingSpot(true, 'REGULAR');
  expect(spot.compatible('HEAVY')).toBe(false);
  expect(spot.compatible('COMPACT')).toBe(true);
});

test('a bike cannot take a handicapped spot', () => {
  const spot = new ParkingSpot(true, 'HANDICAPPED', 'h1');
  expect(() => spot.occupy(bike)).toThrow('A LIGHT vehicle cannot use a HANDICAPPED spot');
  expect(spot.isFree).toBe(true);
});

test('occupy sets the occupant and refuses a second vehicle', () => {
  const spot = new ParkingSpot(true, 'REGULAR', 'r1');
  spot.occupy(car);
  expect(spot.occupant).toEqual(car);

  expect(() => spot.occupy(bike)).toThrow(AlreadyOccupiedError);
  expect(spot.occupant).toEqual(car);
});

test('occupied is checked before compatibility', () => {
  const spot = new ParkingSpot(true, 'LARGE', 'l1');
  spot.occupy(car);
  expect(() => spot.occupy({ type: 'HEAVY', model: 'Actros', plate: 'T-1' })).toThrow(AlreadyOccupiedError);
});

test('vacate is idempotent', () => {
  const spot = new ParkingSpot(true, 'REGULAR', 'r1');
  spot.occupy(car);
  spot.vacate();
  expect(spot.isFree).toBe(true);
  spot.vacate();
  expect(spot.isFree).toBe(true);
  expect(spot.snapshot()).toEqual({ id: 'r1', spotClass: 'REGULAR', isFree: true });
});

test('a spot created as not free is out of service until vacated', () => {
  const spot = new ParkingSpot(false, 'XLARGE', 'x1');
  expect(spot.isFree).toBe(false);
  expect(spot.occupant).toBeUndefined();
  expect(() => spot.occupy(car)).toThrow(AlreadyOccupiedError);

  spot.vacate();
  spot.occupy(car);
  expect(spot.snapshot()).toEqual({ id: 'x1', spotClass: 'XLARGE', isFree: false, vehicle: car });
});

test('generated ids are unique', () => {
  expect(new ParkingSpot().id).not.toBe(new ParkingSpot().id);
});
