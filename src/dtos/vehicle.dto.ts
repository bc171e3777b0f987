export type VehicleClass = 'COMPACT' | 'HEAVY' | 'LIGHT';

export const VEHICLE_CLASSES: readonly VehicleClass[] = ['COMPACT', 'HEAVY', 'LIGHT'];

export interface VehicleDto {
  readonly type: VehicleClass;
  readonly model: string;
  readonly plate: string;
}
