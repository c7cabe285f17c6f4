import { z } from "zod";

// ---- Primitives ----

const PointSchema = z.tuple([z.number(), z.number()]);

const ColorSchema = z
  .string()
  .regex(/^#([0-9a-f]{3}|[0-9a-f]{6}|[0-9a-f]{8})$/i, "Expected #rgb, #rrggbb or #rrggbbaa");

const RectSchema = z.object({
  x: z.number(),
  y: z.number(),
  width: z.number(),
  height: z.number(),
});

// ---- Shapes ----

const PathElementSchema = z.discriminatedUnion("op", [
  z.object({ op: z.literal("move"), to: PointSchema }),
  z.object({ op: z.literal("line"), to: PointSchema }),
  z.object({ op: z.literal("quad"), ctrl: PointSchema, to: PointSchema }),
  z.object({ op: z.literal("cubic"), ctrl1: PointSchema, ctrl2: PointSchema, to: PointSchema }),
  z.object({ op: z.literal("close") }),
]);

/** Angles are in degrees. */
const ShapeSchema = z.discriminatedUnion("type", [
  z.object({ type: z.literal("line"), from: PointSchema, to: PointSchema }),
  RectSchema.extend({ type: z.literal("rect") }),
  RectSchema.extend({ type: z.literal("rounded-rect"), radius: z.number().nonnegative() }),
  z.object({ type: z.literal("circle"), center: PointSchema, radius: z.number().nonnegative() }),
  z.object({
    type: z.literal("ellipse"),
    center: PointSchema,
    radii: PointSchema,
    rotation: z.number().default(0),
  }),
  z.object({
    type: z.literal("arc"),
    center: PointSchema,
    radii: PointSchema,
    start: z.number(),
    sweep: z.number(),
    rotation: z.number().default(0),
  }),
  z.object({ type: z.literal("path"), elements: z.array(PathElementSchema).min(1) }),
]);

// ---- Commands ----

const CommandSchema = z.discriminatedUnion("op", [
  z.object({ op: z.literal("clear"), color: ColorSchema, region: RectSchema.optional() }),
  z.object({ op: z.literal("fill"), shape: ShapeSchema, color: ColorSchema }),
  z.object({ op: z.literal("fill-even-odd"), shape: ShapeSchema, color: ColorSchema }),
  z.object({
    op: z.literal("stroke"),
    shape: ShapeSchema,
    color: ColorSchema,
    width: z.number().nonnegative().default(1),
    dash: z.array(z.number().nonnegative()).optional(),
    cap: z.enum(["butt", "round", "square"]).optional(),
    join: z.enum(["miter", "round", "bevel"]).optional(),
  }),
  z.object({ op: z.literal("clip"), shape: ShapeSchema }),
  z.object({ op: z.literal("save") }),
  z.object({ op: z.literal("restore") }),
  z.object({
    op: z.literal("transform"),
    translate: PointSchema.optional(),
    rotate: z.number().optional(),
    scale: z.union([z.number(), PointSchema]).optional(),
    matrix: z.tuple([z.number(), z.number(), z.number(), z.number(), z.number(), z.number()]).optional(),
  }),
  z.object({
    op: z.literal("text"),
    text: z.string(),
    at: PointSchema,
    font: z.string().optional(),
    size: z.number().positive().optional(),
  }),
  z.object({
    op: z.literal("image"),
    src: z.string(),
    dest: RectSchema,
    source: RectSchema.optional(),
    interpolation: z.enum(["nearest-neighbor", "bilinear"]).default("bilinear"),
  }),
  z.object({
    op: z.literal("blurred-rect"),
    rect: RectSchema,
    radius: z.number().nonnegative(),
    color: ColorSchema,
  }),
]);

// ---- Script ----

export const DrawingScriptSchema = z.object({
  version: z.string(),
  canvas: z.object({
    width: z.number().positive(),
    height: z.number().positive(),
    background: ColorSchema.optional(),
  }),
  fonts: z
    .object({
      system: z.boolean().default(false),
      directories: z.array(z.string()).default([]),
      files: z.array(z.string()).default([]),
    })
    .default({}),
  commands: z.array(CommandSchema),
});

export type DrawingScript = z.infer<typeof DrawingScriptSchema>;
export type ScriptCommand = z.infer<typeof CommandSchema>;
export type ScriptShape = z.infer<typeof ShapeSchema>;
export type ScriptPathElement = z.infer<typeof PathElementSchema>;
export type ScriptRect = z.infer<typeof RectSchema>;
export type ScriptPoint = z.infer<typeof PointSchema>;
