/**
 * Configuration schema
 */

import { z } from 'zod';

const logLevelSchema = z.enum(['error', 'warn', 'info', 'debug']);

export const learningConfigSchema = z.object({
  dbPath: z.string().min(1),
  initialAlpha: z.number().finite().positive(),
  initialBeta: z.number().finite().positive(),
  calibrationBuckets: z.number().int().min(1).max(1000),
  learningRate: z.number().finite().positive(),
  historyLimit: z.number().int().min(1),
  exportPath: z.string().min(1),
  walMode: z.boolean(),
  logLevel: logLevelSchema,
});

/**
 * Shape accepted from a config file: every key optional, unknown keys rejected
 */
export const configFileSchema = learningConfigSchema.partial().strict();
