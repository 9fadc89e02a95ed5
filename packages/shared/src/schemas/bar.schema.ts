import { z } from 'zod';

/**
 * Zod schema for Bar validation
 */
export const BarSchema = z
  .object({
    timestamp: z.number().int().positive(),
    open: z.number().positive().finite(),
    high: z.number().positive().finite(),
    low: z.number().positive().finite(),
    close: z.number().positive().finite(),
    volume: z.number().nonnegative().finite(),
  })
  .refine((bar) => bar.high >= bar.low, {
    message: 'high must be >= low',
    path: ['high'],
  })
  .refine((bar) => bar.high >= Math.max(bar.open, bar.close) && bar.low <= Math.min(bar.open, bar.close), {
    message: 'open and close must lie within [low, high]',
    path: ['close'],
  });

/**
 * Type inferred from schema
 */
export type BarSchemaType = z.infer<typeof BarSchema>;
