import { describe, expect, it } from "vitest";
import { ConfigError, GeometryError } from "../src/errors.js";
import { parseDetectorOutput } from "../src/parser/detector-parser.js";
import { convertFloorplan } from "../src/resolver/floorplan-converter.js";
import type { DetectorOutput } from "../src/types/config.js";
import { LABELS, icon, squareRoom, twoRooms, wall } from "./fixtures.js";

const CONFIG = {
  scale_factor: 1,
  room_type_labels: LABELS,
  axis: { flip_y: false },
};

describe("convertFloorplan", () => {
  it("turns a single rectangle into one room", () => {
    const result = convertFloorplan(squareRoom(), CONFIG);

    expect(result.scene.rooms).toHaveLength(1);
    expect(result.scene.rooms[0]).toMatchObject({
      id: "room_0",
      label: "unknown",
      area: 16,
    });
    expect(result.scene.openings).toEqual([]);
    expect(result.scene.adjacency).toEqual([]);
    expect(result.status).toBe("clean");
  });

  it("connects two rooms through a centred door", () => {
    const result = convertFloorplan(
      twoRooms([icon("door", 3.75, 1.5, 4.25, 2.5)]),
      CONFIG,
    );

    expect(result.scene.rooms).toHaveLength(2);
    expect(result.scene.openings).toHaveLength(1);
    expect(result.scene.openings[0].roomIds).toEqual(["room_0", "room_1"]);
    expect(result.scene.adjacency).toHaveLength(1);
    expect(result.diagnostics).toEqual({ errors: [], warnings: [] });
  });

  it("records a door beyond tolerance and emits it as an object", () => {
    const result = convertFloorplan(
      twoRooms([icon("door", 3.75, 5, 4.25, 6)]),
      CONFIG,
    );

    expect(result.scene.openings).toEqual([]);
    expect(result.objects).toEqual([
      {
        class: "door",
        box: { x: 3.75, y: 5, width: 0.5, height: 1 },
        source: "unmatched-opening",
        sourceIndex: 0,
      },
    ]);
    expect(result.diagnostics.errors.map((e) => e.code)).toEqual([
      "unmatched-opening",
    ]);
    expect(result.status).toBe("anomalies");
  });

  it("ignores a dangling wall inside a room", () => {
    const detector = squareRoom();
    detector.corners.push([2, 2]);
    detector.walls.push(wall(0, 4));

    const result = convertFloorplan(detector, CONFIG);
    expect(result.scene.rooms).toHaveLength(1);
    expect(result.scene.walls).toHaveLength(5);
    expect(result.scene.walls[4].roomIds).toEqual([]);
  });

  it("cuts an island room out of the room around it", () => {
    const detector = squareRoom();
    detector.corners.push([1, 1], [2, 1], [2, 2], [1, 2]);
    detector.walls.push(wall(4, 5), wall(5, 6), wall(6, 7), wall(7, 4));

    const result = convertFloorplan(detector, CONFIG);
    expect(result.scene.rooms.map((r) => [r.id, r.area, r.holes.length])).toEqual([
      ["room_0", 1, 0],
      ["room_1", 15, 1],
    ]);
    expect(result.scene.walls[4].roomIds).toEqual(["room_0", "room_1"]);
    expect(result.diagnostics.warnings.map((w) => w.code)).toEqual([
      "nested-component",
    ]);
    expect(result.status).toBe("clean");
  });

  it("produces byte-identical output for identical input", () => {
    const detector = twoRooms([
      icon("door", 3.75, 1.5, 4.25, 2.5),
      icon("window", 1.5, -0.25, 2.5, 0.25),
      icon("bed", 5, 1, 7, 3),
    ]);
    const first = JSON.stringify(convertFloorplan(detector, CONFIG));
    const second = JSON.stringify(convertFloorplan(detector, CONFIG));
    expect(first).toBe(second);
  });

  it("normalizes pixels into the metric, y-up frame", () => {
    // 400 x 400 px square at 1 cm per pixel, image rows growing down
    const detector: DetectorOutput = {
      corners: [
        [0, 0],
        [400, 0],
        [400, 400],
        [0, 400],
      ],
      walls: [wall(0, 1), wall(1, 2), wall(2, 3), wall(3, 0)],
      icons: [],
    };
    const result = convertFloorplan(detector, {
      scale_factor: 0.01,
      room_type_labels: LABELS,
    });

    const [room] = result.scene.rooms;
    expect(room.area).toBeCloseTo(16, 9);
    expect(result.scene.bounds.x).toBeCloseTo(0, 9);
    expect(result.scene.bounds.y).toBeCloseTo(-4, 9);
    expect(result.scene.bounds.width).toBeCloseTo(4, 9);
  });

  // Kitchen on the left, bedroom on the right; each wall names the room on
  // its right as the image is viewed.
  const TWO_ROOM_TEXT = [
    "8 4",
    "7",
    "0 0 4 0 3 1",
    "4 0 8 0 3 2",
    "8 0 8 4 3 2",
    "8 4 4 4 3 2",
    "4 4 0 4 3 1",
    "0 4 0 0 3 1",
    "4 0 4 4 2 1",
  ].join("\n");

  it.each([true, false])("reads side labels from text output (flip_y %s)", (flip_y) => {
    const result = convertFloorplan(parseDetectorOutput(TWO_ROOM_TEXT, LABELS), {
      ...CONFIG,
      axis: { flip_y },
    });

    expect(
      result.scene.rooms.map((r) => [r.centroid.x, r.label]),
    ).toEqual([
      [2, "kitchen"],
      [6, "bedroom"],
    ]);
  });

  it("throws ConfigError before touching the geometry", () => {
    expect(() =>
      convertFloorplan(squareRoom(), { ...CONFIG, scale_factor: 0 }),
    ).toThrow(ConfigError);
  });

  it("throws GeometryError for walls referencing missing corners", () => {
    const detector = squareRoom();
    detector.walls.push(wall(0, 9));
    expect(() => convertFloorplan(detector, CONFIG)).toThrow(GeometryError);
  });
});
