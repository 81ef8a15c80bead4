import { GeometryError } from "../errors.js";
import type {
  DetectorIcon,
  DetectorOutput,
  DetectorRoomLabel,
  DetectorWall,
  LabelRef,
} from "../types/config.js";
import { DetectorOutputSchema } from "../types/config.js";

/**
 * Parse detector output. JSON input is validated against
 * DetectorOutputSchema; anything else is read as the raster-to-vector text
 * format:
 *
 *   width height
 *   N                               (wall count)
 *   x1 y1 x2 y2 left right          (N lines, label indices per side)
 *   x1 y1 x2 y2 category ...        (icons and room annotations)
 *
 * Fields are separated by tabs or spaces. Text-format corners are
 * deduplicated by exact coordinate; an annotation whose category is one of
 * `labels` becomes a room label prediction at its box centre.
 */
export function parseDetectorOutput(
  input: string,
  labels: string[],
): DetectorOutput {
  let raw: unknown;
  let isJson = true;

  try {
    raw = JSON.parse(input);
  } catch {
    isJson = false;
  }

  if (isJson) {
    const result = DetectorOutputSchema.safeParse(raw);
    if (!result.success) {
      const issues = result.error.issues
        .map((i) => `  - ${i.path.join(".")}: ${i.message}`)
        .join("\n");
      throw new GeometryError(`Invalid detector output:\n${issues}`);
    }
    return result.data;
  }

  return parseDetectorText(input, labels);
}

function parseDetectorText(input: string, labels: string[]): DetectorOutput {
  const lines = input
    .split(/\r?\n/)
    .map((text, i) => ({ text: text.trim(), lineNo: i + 1 }))
    .filter((l) => l.text !== "");

  if (lines.length < 2) {
    throw new GeometryError(
      "Detector output must start with a size line and a wall count line",
    );
  }

  const [width, height] = parseNumbers(lines[0].text.split(/\s+/), 2, lines[0].lineNo);
  const [wallCount] = parseNumbers(lines[1].text.split(/\s+/), 1, lines[1].lineNo);
  if (!Number.isInteger(wallCount) || wallCount < 0) {
    throw new GeometryError(
      `Line ${lines[1].lineNo}: wall count must be a non-negative integer (got "${lines[1].text}")`,
    );
  }
  if (lines.length < 2 + wallCount) {
    throw new GeometryError(
      `Expected ${wallCount} wall lines but found ${lines.length - 2}`,
    );
  }

  const corners: [number, number][] = [];
  const cornerIndex = new Map<string, number>();
  const cornerId = (x: number, y: number): number => {
    const key = `${x}_${y}`;
    const existing = cornerIndex.get(key);
    if (existing !== undefined) return existing;
    corners.push([x, y]);
    cornerIndex.set(key, corners.length - 1);
    return corners.length - 1;
  };

  const walls: DetectorWall[] = [];
  for (const line of lines.slice(2, 2 + wallCount)) {
    const fields = line.text.split(/\s+/);
    if (fields.length !== 6) {
      throw new GeometryError(
        `Line ${line.lineNo}: wall lines need 6 fields (x1 y1 x2 y2 left right), got ${fields.length}`,
      );
    }
    const [x1, y1, x2, y2, left, right] = parseNumbers(fields, 6, line.lineNo);
    walls.push({
      corners: [cornerId(x1, y1), cornerId(x2, y2)],
      labels: { left, right },
    });
  }

  const icons: DetectorIcon[] = [];
  const rooms: DetectorRoomLabel[] = [];
  for (const line of lines.slice(2 + wallCount)) {
    const fields = line.text.split(/\s+/);
    if (fields.length < 5) {
      throw new GeometryError(
        `Line ${line.lineNo}: annotation lines need at least 5 fields (x1 y1 x2 y2 category), got ${fields.length}`,
      );
    }
    const [x1, y1, x2, y2] = parseNumbers(fields.slice(0, 4), 4, line.lineNo);
    const category = fields[4];

    if (labels.includes(category)) {
      rooms.push({ label: category, point: [(x1 + x2) / 2, (y1 + y2) / 2] });
      continue;
    }

    const icon: DetectorIcon = {
      class: category,
      box: { x_min: x1, y_min: y1, x_max: x2, y_max: y2 },
    };
    // Door/window annotations are often drawn as lines; a flat box tells
    // which way the host wall runs.
    if (y1 === y2 && x1 !== x2) icon.orientation = "horizontal";
    if (x1 === x2 && y1 !== y2) icon.orientation = "vertical";
    icons.push(icon);
  }

  return { width, height, corners, walls, icons, rooms };
}

function parseNumbers(fields: string[], count: number, lineNo: number): number[] {
  if (fields.length < count) {
    throw new GeometryError(
      `Line ${lineNo}: expected ${count} numeric fields, got ${fields.length}`,
    );
  }
  return fields.slice(0, count).map((field) => {
    const value = Number(field);
    if (field === "" || !Number.isFinite(value)) {
      throw new GeometryError(`Line ${lineNo}: "${field}" is not a number`);
    }
    return value;
  });
}

/**
 * Resolve a label reference (index or name) to an index into `labels`.
 */
export function resolveLabelRef(
  ref: LabelRef,
  labels: string[],
  path: string,
): number {
  if (typeof ref === "number") {
    if (!Number.isInteger(ref) || ref < 0 || ref >= labels.length) {
      throw new GeometryError(
        `${path}: label index ${ref} is out of range (${labels.length} room type labels configured)`,
      );
    }
    return ref;
  }

  const index = labels.indexOf(ref);
  if (index === -1) {
    throw new GeometryError(
      `${path}: unknown room type label "${ref}". Available: ${labels.join(", ")}`,
    );
  }
  return index;
}
