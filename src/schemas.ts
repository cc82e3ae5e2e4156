import { z } from "zod";

export const DirectionSchema = z.enum(["UP", "DOWN", "LEFT", "RIGHT"]);

export const PointSchema = z.object({
  row: z.number().int().min(0),
  col: z.number().int().min(0),
});

export const BodySegmentSchema = z.object({
  position: PointSchema,
  heading: DirectionSchema,
});

// The smallest grid with a single interior cell; the engine checks that the
// starting snake and food actually fit.
export const GridSchema = z.object({
  height: z.number().int().min(3),
  width: z.number().int().min(3),
});

// Node's keypress objects leave fields undefined for plain characters.
export const KeyEventSchema = z.object({
  name: z.string().default(""),
  sequence: z.string().default(""),
  ctrl: z.boolean().default(false),
});

export const LogSettingsSchema = z.object({
  level: z.enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"]).default("info"),
  file: z.string().min(1).optional(),
});
