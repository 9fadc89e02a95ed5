import { z } from 'zod';
import type { ExitSpec, ExitSpecWire } from '../types/position.js';

export const DirectionSchema = z.enum(['long', 'short']);

export const ExitReasonSchema = z.enum([
  'stop_loss',
  'take_profit',
  'trailing_stop',
  'time_stop',
  'end_of_run',
  'manual',
]);

export const TrailingSpecSchema = z.object({
  activationPrice: z.number().positive().finite(),
  distanceAtr: z.number().positive().finite(),
});

/**
 * Exit spec as held by a Position
 */
export const ExitSpecSchema = z.object({
  stopLossPrice: z.number().positive().finite(),
  takeProfitPrice: z.number().positive().finite(),
  timeStopBars: z.number().int().positive(),
  trailing: TrailingSpecSchema.nullable(),
});

/**
 * Flat exit spec with an explicit enable flag
 */
export const ExitSpecWireSchema = z
  .object({
    stopLossPrice: z.number().positive().finite(),
    takeProfitPrice: z.number().positive().finite(),
    timeStopBars: z.number().int().positive(),
    trailingEnabled: z.boolean(),
    trailingActivationPrice: z.number().positive().finite().nullish(),
    trailingDistanceAtr: z.number().positive().finite().nullish(),
  })
  .refine(
    (spec) =>
      !spec.trailingEnabled ||
      (spec.trailingActivationPrice != null && spec.trailingDistanceAtr != null),
    {
      message: 'trailingActivationPrice and trailingDistanceAtr are required when trailing is enabled',
      path: ['trailingEnabled'],
    }
  );

/**
 * Convert the flat form into an ExitSpec.
 * Trailing disabled and trailing enabled-but-idle become structurally distinct.
 */
export function toExitSpec(wire: ExitSpecWire): ExitSpec {
  const parsed = ExitSpecWireSchema.parse(wire);
  const trailing =
    parsed.trailingEnabled && parsed.trailingActivationPrice != null && parsed.trailingDistanceAtr != null
      ? { activationPrice: parsed.trailingActivationPrice, distanceAtr: parsed.trailingDistanceAtr }
      : null;

  return {
    stopLossPrice: parsed.stopLossPrice,
    takeProfitPrice: parsed.takeProfitPrice,
    timeStopBars: parsed.timeStopBars,
    trailing,
  };
}

/**
 * Flatten an ExitSpec back into the wire form
 */
export function toExitSpecWire(spec: ExitSpec): ExitSpecWire {
  return {
    stopLossPrice: spec.stopLossPrice,
    takeProfitPrice: spec.takeProfitPrice,
    timeStopBars: spec.timeStopBars,
    trailingEnabled: spec.trailing !== null,
    trailingActivationPrice: spec.trailing?.activationPrice ?? null,
    trailingDistanceAtr: spec.trailing?.distanceAtr ?? null,
  };
}
