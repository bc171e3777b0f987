import { z } from 'zod';
import { ConfigError } from "./errors/parkingErrors";
import { LogLevel } from "./infra/logger";
import { DEFAULT_RATE_PER_HOUR } from "./services/hourlyFeeCalculator";
import { DEFAULT_SPOTS_PER_FLOOR } from "./models/parkingFloor";

// A blank `KEY=` line in .env arrives as '' and means "not set".
const blankAsUnset = (v: unknown) => (typeof v === 'string' && v.trim() === '' ? undefined : v);

const ConfigSchema = z.object({
  PARKING_RATE_PER_HOUR: z.preprocess(
    blankAsUnset,
    z.coerce.number().nonnegative().default(DEFAULT_RATE_PER_HOUR),
  ),
  PARKING_DEFAULT_SPOTS_PER_FLOOR: z.preprocess(
    blankAsUnset,
    z.coerce.number().int().nonnegative().default(DEFAULT_SPOTS_PER_FLOOR),
  ),
  PARKING_TICKET_PREFIX: z.preprocess(blankAsUnset, z.string().min(1).default('TKT_')),
  LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error', 'silent']).default('info'),
});

export interface ParkingConfig {
  ratePerHour: number;
  defaultSpotsPerFloor: number;
  ticketPrefix: string;
  logLevel: LogLevel;
}

/**
 * Reads settings from an env map (process.env by default). Call dotenv's
 * `config()` first when settings should come from a .env file.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): ParkingConfig {
  const parsed = ConfigSchema.safeParse(env);
  if (!parsed.success) {
    throw new ConfigError(parsed.error.issues.map(i => `${i.path.join('.')}: ${i.message}`));
  }
  const c = parsed.data;
  return {
    ratePerHour: c.PARKING_RATE_PER_HOUR,
    defaultSpotsPerFloor: c.PARKING_DEFAULT_SPOTS_PER_FLOOR,
    ticketPrefix: c.PARKING_TICKET_PREFIX,
    logLevel: c.LOG_LEVEL,
  };
}
