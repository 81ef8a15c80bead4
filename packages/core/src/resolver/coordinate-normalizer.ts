import { ConfigError } from "../errors.js";
import { resolveLabelRef } from "../parser/detector-parser.js";
import type {
  ConverterConfig,
  DetectorOutput,
  PixelBox,
} from "../types/config.js";
import type {
  NormalizedFloorplan,
  Point,
  Rect,
  SideLabels,
} from "../types/geometry.js";

export interface Normalizer {
  /** True when the transform mirrors the frame (flip_y) */
  mirrored: boolean;
  point(p: Point): Point;
  rect(r: Rect): Rect;
  length(value: number): number;
  inverse(p: Point): Point;
}

/**
 * Create the pixel → metric transform:
 *   metric = (pixel - origin) * scale_factor, with y negated when flip_y.
 * Image rows grow downward; the scene frame is y-up, hence the flip.
 */
export function createNormalizer(
  config: Pick<ConverterConfig, "scale_factor" | "axis">,
): Normalizer {
  const scale = config.scale_factor;
  if (!(scale > 0)) {
    throw new ConfigError(
      `scale_factor must be greater than 0 (got ${scale})`,
    );
  }

  const [ox, oy] = config.axis.origin;
  const ySign = config.axis.flip_y ? -1 : 1;

  const point = (p: Point): Point => ({
    x: (p.x - ox) * scale,
    y: ySign * (p.y - oy) * scale,
  });

  return {
    mirrored: config.axis.flip_y,
    point,
    rect(r: Rect): Rect {
      const a = point({ x: r.x, y: r.y });
      const b = point({ x: r.x + r.width, y: r.y + r.height });
      return {
        x: Math.min(a.x, b.x),
        y: Math.min(a.y, b.y),
        width: Math.abs(b.x - a.x),
        height: Math.abs(b.y - a.y),
      };
    },
    length(value: number): number {
      return value * scale;
    },
    inverse(p: Point): Point {
      return {
        x: p.x / scale + ox,
        y: (ySign * p.y) / scale + oy,
      };
    },
  };
}

/** Convert a detector box (either corner order) to a pixel-space Rect. */
export function pixelBoxToRect(box: PixelBox): Rect {
  return {
    x: Math.min(box.x_min, box.x_max),
    y: Math.min(box.y_min, box.y_max),
    width: Math.abs(box.x_max - box.x_min),
    height: Math.abs(box.y_max - box.y_min),
  };
}

/**
 * Apply the normalizer to every coordinate of a detector output and resolve
 * label references to indices into `room_type_labels`.
 *
 * Detector side labels are read as the image is viewed: `right` is the side
 * where cross(end - start, p - start) > 0 in pixel rows growing down. In a
 * y-up frame that side is the viewer's right as well, so the labels pass
 * through; a frame kept y-down swaps them so `left` still means cross > 0.
 */
export function normalizeDetectorOutput(
  detector: DetectorOutput,
  config: ConverterConfig,
): NormalizedFloorplan {
  const normalizer = createNormalizer(config);
  const labels = config.room_type_labels;

  const corners = detector.corners.map(([x, y]) => normalizer.point({ x, y }));

  const walls = detector.walls.map((wall, i) => {
    const left =
      wall.labels?.left !== undefined
        ? resolveLabelRef(wall.labels.left, labels, `walls[${i}].labels.left`)
        : undefined;
    const right =
      wall.labels?.right !== undefined
        ? resolveLabelRef(wall.labels.right, labels, `walls[${i}].labels.right`)
        : undefined;
    const sideLabels: SideLabels = normalizer.mirrored
      ? { left, right }
      : { left: right, right: left };

    return {
      corners: wall.corners,
      thickness:
        wall.thickness !== undefined
          ? normalizer.length(wall.thickness)
          : undefined,
      sideLabels,
    };
  });

  const icons = detector.icons.map((icon, index) => ({
    index,
    class: icon.class,
    box: normalizer.rect(pixelBoxToRect(icon.box)),
    orientation: icon.orientation,
  }));

  const roomLabels = (detector.rooms ?? []).map((room, i) => ({
    label: resolveLabelRef(room.label, labels, `rooms[${i}].label`),
    point: normalizer.point({ x: room.point[0], y: room.point[1] }),
  }));

  return { corners, walls, icons, roomLabels };
}
