import { describe, expect, it } from "vitest";
import {
  roomDoorRoomTriples,
  toObjectAabbs,
  toSceneState,
} from "../src/export/scene-state.js";
import { convertFloorplan } from "../src/resolver/floorplan-converter.js";
import { resolveConfig } from "../src/parser/config-parser.js";
import { LABELS, icon, makeConfig, twoRooms, wall } from "./fixtures.js";

const config = makeConfig();
const result = convertFloorplan(
  twoRooms([
    icon("door", 3.75, 1.5, 4.25, 2.5),
    icon("window", 1.5, -0.25, 2.5, 0.25),
    icon("door", 6, -0.25, 7, 0.25),
    icon("bathtub", 0.5, 0.5, 1.5, 1),
  ]),
  config,
);

describe("toSceneState", () => {
  const state = toSceneState(result, config, "plan_1");
  const { arch } = state.scene;

  it("writes the scene header", () => {
    expect(state.format).toBe("sceneState");
    expect(state.scene.up).toEqual({ x: 0, y: 1, z: 0 });
    expect(state.scene.front).toEqual({ x: 0, y: 0, z: 1 });
    expect(state.scene.unit).toBe(1);
    expect(arch.id).toBe("plan_1");
    expect(arch.version).toBe("arch@1.0.2");
    expect(arch.defaults.Wall).toEqual({ depth: 0.1, extraHeight: 0.035 });
  });

  it("emits walls with holes, then floors and ceilings", () => {
    expect(arch.elements).toHaveLength(7 + 2 * 2);
    expect(arch.elements.map((e) => e.id).slice(7)).toEqual([
      "room_0_f",
      "room_0_c",
      "room_1_f",
      "room_1_c",
    ]);

    const shared = arch.elements[6];
    expect(shared).toEqual({
      id: "wall_6",
      type: "Wall",
      roomId: ["room_0", "room_1"],
      points: [
        [4, 0, 0],
        [4, 0, 4],
      ],
      holes: [
        { id: "opening_2", type: "Door", box: { min: [1.5, 0], max: [2.5, 2.1] } },
      ],
      height: 2.75,
      depth: 0.1,
      extra_height: 0.035,
    });

    const bottom = arch.elements[0];
    expect(bottom.type === "Wall" && bottom.holes).toEqual([
      { id: "opening_0", type: "Window", box: { min: [1.5, 0.9], max: [2.5, 2.1] } },
    ]);

    const ceiling = arch.elements[8];
    expect(ceiling.type === "Ceiling" && ceiling.offset).toEqual([0, 2.75, 0]);
  });

  it("lists room types and room-door-room triples", () => {
    expect(arch.rooms).toEqual([
      { id: "room_0", types: ["unknown"] },
      { id: "room_1", types: ["unknown"] },
    ]);
    expect(arch.rdr).toEqual([
      ["room_1", "opening_1", null],
      ["room_0", "opening_2", "room_1"],
      ["room_1", "opening_2", "room_0"],
    ]);
  });
});

describe("roomDoorRoomTriples", () => {
  it("skips windows and unattached doors", () => {
    expect(roomDoorRoomTriples(result.scene.openings.filter((o) => o.type === "window"))).toEqual([]);
  });
});

describe("toObjectAabbs", () => {
  it("writes min and max corners", () => {
    expect(toObjectAabbs(result.objects, config)).toEqual({
      objects: [{ type: "bathtub", bound_box: { p1: [0.5, 0.5], p2: [1.5, 1] } }],
    });
  });
});

describe("floor-plane orientation", () => {
  // 400 px square at 1 cm per pixel, converted with the default y-up frame
  const flipped = resolveConfig({ scale_factor: 0.01, room_type_labels: LABELS });
  const plan = convertFloorplan(
    {
      corners: [
        [0, 0],
        [400, 0],
        [400, 400],
        [0, 400],
      ],
      walls: [wall(0, 1), wall(1, 2), wall(2, 3), wall(3, 0)],
      icons: [icon("bed", 100, 300, 200, 350)],
    },
    flipped,
  );

  it("puts image rows on +z", () => {
    const { arch } = toSceneState(plan, flipped, "square").scene;
    const right = arch.elements[1];
    expect(right.type === "Wall" && right.points).toEqual([
      [4, 0, 0],
      [4, 0, 4],
    ]);
  });

  it("keeps object boxes in the same frame as the walls", () => {
    expect(toObjectAabbs(plan.objects, flipped)).toEqual({
      objects: [{ type: "bed", bound_box: { p1: [1, 3], p2: [2, 3.5] } }],
    });
  });
});
