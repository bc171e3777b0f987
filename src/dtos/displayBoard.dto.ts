export interface DisplayBoard {
  uid: string;
  name: string;
  address: string;
  numFloors: number;
  numTotalSpots: number;
  numFreeSpots: number;
  numParkedVehicles: number;
}
