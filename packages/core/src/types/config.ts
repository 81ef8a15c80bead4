import { z } from "zod";

// ---- Enums ----

export type OpeningType = "door" | "window";
export type IconOrientation = "horizontal" | "vertical";
export type LabelAssignment = "auto" | "wall-sides" | "centroid";
export type HostTieBreak = "shortest" | "longest";
export type SortAxis = "x" | "y";
/**
 * "detector": trust the icon classes. "entrance": treat every opening as
 * unclassified and decide from the plan (interior walls and entrance
 * markers give doors, everything else is a window).
 */
export type OpeningClassification = "detector" | "entrance";

export const OPENING_TYPES: readonly OpeningType[] = ["door", "window"];

// ---- Converter configuration ----

export interface AxisConfig {
  /** Negate y so that image rows (growing down) become a y-up scene frame */
  flip_y: boolean;
  /** Pixel coordinate that maps to the metric origin */
  origin: [number, number];
}

export interface SplitWallsConfig {
  enabled: boolean;
  max_iter: number;
}

export interface StraightenWallsConfig {
  enabled: boolean;
  cutoff_gradient: number;
  max_iter: number;
}

export interface ArchDefaultsConfig {
  version: string;
  up: [number, number, number];
  front: [number, number, number];
  scale_to_meters: number;
  wall_height: number;
  wall_depth: number;
  wall_extra_height: number;
  ceiling_depth: number;
  floor_depth: number;
  door_min_y: number;
  door_max_y: number;
  window_min_y: number;
  window_max_y: number;
}

/**
 * Immutable configuration shared by every stage of a conversion.
 * Distances (thickness, tolerances) are in metric units, i.e. after
 * normalization; `axis.origin` is in pixels.
 */
export interface ConverterConfig {
  scale_factor: number;
  room_type_labels: string[];
  unknown_room_label: string;
  excluded_room_labels: string[];
  default_wall_thickness: number;
  opening_match_tolerance: number;
  corner_snap_tolerance: number;
  axis: AxisConfig;
  label_assignment: LabelAssignment;
  host_tie_break: HostTieBreak;
  room_sort_axis: SortAxis;
  max_trace_steps: number;
  split_walls: SplitWallsConfig;
  straighten_walls: StraightenWallsConfig;
  interior_openings_as_doors: boolean;
  opening_classification: OpeningClassification;
  /** Icon classes marking the entrance; never emitted as objects */
  entrance_classes: string[];
  ignored_icon_classes: string[];
  arch_defaults: ArchDefaultsConfig;
}

// ---- Detector output (pixel space, before normalization) ----

export type LabelRef = number | string;

export interface PixelBox {
  x_min: number;
  y_min: number;
  x_max: number;
  y_max: number;
}

export interface DetectorWall {
  corners: [number, number];
  thickness?: number;
  labels?: {
    left?: LabelRef;
    right?: LabelRef;
  };
}

export interface DetectorIcon {
  class: string;
  box: PixelBox;
  orientation?: IconOrientation;
}

export interface DetectorRoomLabel {
  label: LabelRef;
  point: [number, number];
}

export interface DetectorOutput {
  width?: number;
  height?: number;
  corners: [number, number][];
  walls: DetectorWall[];
  icons: DetectorIcon[];
  rooms?: DetectorRoomLabel[];
}

// ---- Zod schemas for runtime validation ----

const PositiveNumber = z.number().positive();
const NonNegativeNumber = z.number().nonnegative();
const Vec2Schema = z.tuple([z.number(), z.number()]);
const Vec3Schema = z.tuple([z.number(), z.number(), z.number()]);

const AxisSchema = z.object({
  flip_y: z.boolean().default(true),
  origin: Vec2Schema.default([0, 0]),
});

const SplitWallsSchema = z.object({
  enabled: z.boolean().default(true),
  max_iter: z.number().int().positive().default(100),
});

const StraightenWallsSchema = z.object({
  enabled: z.boolean().default(false),
  cutoff_gradient: PositiveNumber.default(0.05),
  max_iter: z.number().int().positive().default(100),
});

const ArchDefaultsSchema = z.object({
  version: z.string().default("arch@1.0.2"),
  up: Vec3Schema.default([0, 1, 0]),
  front: Vec3Schema.default([0, 0, 1]),
  scale_to_meters: PositiveNumber.default(1),
  wall_height: PositiveNumber.default(2.75),
  wall_depth: PositiveNumber.default(0.1),
  wall_extra_height: NonNegativeNumber.default(0.035),
  ceiling_depth: PositiveNumber.default(0.05),
  floor_depth: PositiveNumber.default(0.05),
  door_min_y: NonNegativeNumber.default(0),
  door_max_y: PositiveNumber.default(2.1),
  window_min_y: NonNegativeNumber.default(0.9),
  window_max_y: PositiveNumber.default(2.1),
});

export const ConverterConfigSchema = z
  .object({
    scale_factor: z.number({
      required_error: "scale_factor is required",
    }),
    room_type_labels: z.array(z.string().min(1)).min(1),
    unknown_room_label: z.string().min(1).default("unknown"),
    excluded_room_labels: z.array(z.string()).default(["outside"]),
    default_wall_thickness: PositiveNumber.default(0.1),
    opening_match_tolerance: NonNegativeNumber.default(0.1),
    corner_snap_tolerance: NonNegativeNumber.default(0.05),
    axis: AxisSchema.default({}),
    label_assignment: z.enum(["auto", "wall-sides", "centroid"]).default("auto"),
    host_tie_break: z.enum(["shortest", "longest"]).default("shortest"),
    room_sort_axis: z.enum(["x", "y"]).default("x"),
    max_trace_steps: z.number().int().positive().default(500),
    split_walls: SplitWallsSchema.default({}),
    straighten_walls: StraightenWallsSchema.default({}),
    interior_openings_as_doors: z.boolean().default(false),
    opening_classification: z.enum(["detector", "entrance"]).default("detector"),
    entrance_classes: z.array(z.string()).default(["entrance"]),
    ignored_icon_classes: z.array(z.string()).default([]),
    arch_defaults: ArchDefaultsSchema.default({}),
  })
  .superRefine((config, ctx) => {
    if (!(config.scale_factor > 0)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["scale_factor"],
        message: `must be greater than 0 (got ${config.scale_factor})`,
      });
    }
    const seen = new Set<string>();
    config.room_type_labels.forEach((label, i) => {
      if (seen.has(label)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ["room_type_labels", i],
          message: `duplicate label "${label}"; label indices must be unambiguous`,
        });
      }
      seen.add(label);
    });
  });

export type ConverterConfigInput = z.input<typeof ConverterConfigSchema>;

const LabelRefSchema = z.union([z.number().int(), z.string()]);

const PixelBoxSchema = z.object({
  x_min: z.number(),
  y_min: z.number(),
  x_max: z.number(),
  y_max: z.number(),
});

export const DetectorOutputSchema = z.object({
  width: z.number().optional(),
  height: z.number().optional(),
  corners: z.array(Vec2Schema),
  walls: z.array(
    z.object({
      corners: z.tuple([z.number(), z.number()]),
      thickness: PositiveNumber.optional(),
      labels: z
        .object({
          left: LabelRefSchema.optional(),
          right: LabelRefSchema.optional(),
        })
        .optional(),
    }),
  ),
  icons: z
    .array(
      z.object({
        class: z.string().min(1),
        box: PixelBoxSchema,
        orientation: z.enum(["horizontal", "vertical"]).optional(),
      }),
    )
    .default([]),
  rooms: z
    .array(
      z.object({
        label: LabelRefSchema,
        point: Vec2Schema,
      }),
    )
    .optional(),
});
