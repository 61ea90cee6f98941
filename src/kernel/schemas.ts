import { z } from 'zod';
import { SLOT_COUNT } from './types.js';

export const IntegerSchema = z.number().int();
export const StringSchema = z.string();

export const OrientationSchema = z.union([z.literal(0), z.literal(1), z.literal(2)]);

export const CornerStateSchema = z
  .object({
    cornerPos: z.array(IntegerSchema.min(0).max(SLOT_COUNT - 1)).length(SLOT_COUNT),
    cornerOrt: z.array(OrientationSchema).length(SLOT_COUNT),
  })
  .strict();

export const ColorLabelSchema = StringSchema.regex(/^[A-Z]$/u, 'Color labels are single uppercase letters.');

export const CornerColorsSchema = z.tuple([ColorLabelSchema, ColorLabelSchema, ColorLabelSchema]);

export const ColorSchemeSchema = z
  .object({
    id: StringSchema.min(1),
    version: z.literal(1),
    corners: z.array(CornerColorsSchema).length(SLOT_COUNT),
  })
  .strict();

export type ColorSchemeAsset = z.infer<typeof ColorSchemeSchema>;
