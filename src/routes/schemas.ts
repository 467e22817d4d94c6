import { z } from 'zod';

const macAddress = z
  .string()
  .regex(/^[0-9A-Fa-f]{2}([:-][0-9A-Fa-f]{2}){5}$/, 'Expected a MAC address')
  .transform((val) => val.replace(/-/g, ':').toUpperCase());

export const deauthEventSchema = z.object({
  timestamp: z.number().finite().nonnegative(),
  transmitterAddress: macAddress,
  destinationAddress: macAddress,
  reasonCode: z.number().int().min(0).max(65535),
});

export const eventBatchSchema = z.object({
  events: z.array(deauthEventSchema).min(1).max(10_000),
});

// range checks are left to the engine so they surface as configuration errors
export const sessionSettingsSchema = z.object({
  interfaceId: z.string().trim().min(1).max(64).optional(),
  threshold: z.number().optional(),
  timeWindow: z.number().optional(),
});

export const simulationSchema = z.object({
  durationMs: z.number().int().positive().max(600_000).default(10_000),
  attack: z.enum(['broadcast', 'targeted', 'flood', 'random', 'none']).default('random'),
  normalRate: z.number().nonnegative().max(10).default(0.1),
});
