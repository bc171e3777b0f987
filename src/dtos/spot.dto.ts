import { VehicleClass, VehicleDto } from "./vehicle.dto";

export type SpotClass = 'LARGE' | 'REGULAR' | 'XLARGE' | 'HANDICAPPED';

export const SPOT_CLASSES: readonly SpotClass[] = ['LARGE', 'REGULAR', 'XLARGE', 'HANDICAPPED'];

// Handicapped spots admit none of the vehicle classes the lot knows about.
export const COMPATIBILITY: Readonly<Record<VehicleClass, Readonly<Record<SpotClass, boolean>>>> = {
  COMPACT: { LARGE: true, REGULAR: true, XLARGE: true, HANDICAPPED: false },
  HEAVY: { LARGE: true, REGULAR: false, XLARGE: true, HANDICAPPED: false },
  LIGHT: { LARGE: true, REGULAR: true, XLARGE: true, HANDICAPPED: false },
};

export interface SpotSnapshot {
  id: string;
  spotClass: SpotClass;
  isFree: boolean;
  vehicle?: VehicleDto;
}
