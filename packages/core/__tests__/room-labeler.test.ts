import { describe, expect, it } from "vitest";
import { assignRoomLabels } from "../src/resolver/room-labeler.js";
import type { DetectorWall } from "../src/types/config.js";
import type { RoomLabelPrediction } from "../src/types/geometry.js";
import { makeConfig, prepare, twoRooms, wall } from "./fixtures.js";

/**
 * Walls of the two-room plan with side labels. The fixtures keep image
 * rows growing down, so the rooms lie on each wall's detector `right`
 * side. The left room is bounded by walls 0, 4, 5 and the shared wall 6
 * (walked forward); the right room by walls 1, 2, 3 and wall 6 walked in
 * reverse. `shared` lists the labels of the left and right room.
 */
function labelledWalls(leftRoom: string[], shared: [string, string]): DetectorWall[] {
  return [
    wall(0, 1, { left: "outside", right: leftRoom[0] }),
    wall(1, 2, { left: "outside", right: "kitchen" }),
    wall(2, 3, { left: "outside", right: "kitchen" }),
    wall(3, 4, { left: "outside", right: "kitchen" }),
    wall(4, 5, { left: "outside", right: leftRoom[1] }),
    wall(5, 0, { left: "outside", right: leftRoom[2] }),
    wall(1, 4, { left: shared[1], right: shared[0] }),
  ];
}

function label(
  walls: DetectorWall[] | undefined,
  predictions: RoomLabelPrediction[],
  config = makeConfig(),
) {
  const { graph, extraction } = prepare(twoRooms([], walls), config);
  return assignRoomLabels(graph, extraction, predictions, config).faces.map(
    (f) => [f.label, f.labelSource],
  );
}

describe("assignRoomLabels", () => {
  it("votes over wall sides", () => {
    const walls = labelledWalls(
      ["living_room", "living_room", "living_room"],
      ["living_room", "kitchen"],
    );
    expect(label(walls, [])).toEqual([
      ["living_room", "wall-sides"],
      ["kitchen", "wall-sides"],
    ]);
  });

  it("breaks vote ties by label order", () => {
    const walls = labelledWalls(
      ["kitchen", "kitchen", "living_room"],
      ["living_room", "kitchen"],
    );
    expect(label(walls, [])[0]).toEqual(["living_room", "wall-sides"]);
  });

  it("ignores excluded labels and falls back to centroid predictions", () => {
    const walls = labelledWalls(
      ["outside", "outside", "outside"],
      ["outside", "kitchen"],
    );
    const predictions = [
      { label: 2, point: { x: 1, y: 1 } },
      { label: 0, point: { x: 2, y: 2.5 } },
    ];
    expect(label(walls, predictions)[0]).toEqual(["living_room", "centroid"]);
  });

  it("uses only predictions inside the face in centroid mode", () => {
    const predictions = [
      { label: 2, point: { x: 1, y: 1 } },
      { label: 1, point: { x: 6, y: 2 } },
    ];
    expect(
      label(undefined, predictions, makeConfig({ label_assignment: "centroid" })),
    ).toEqual([
      ["bedroom", "centroid"],
      ["kitchen", "centroid"],
    ]);
  });

  it("skips predictions of excluded labels", () => {
    const predictions = [{ label: 3, point: { x: 2, y: 2 } }];
    expect(label(undefined, predictions)).toEqual([
      ["unknown", "none"],
      ["unknown", "none"],
    ]);
  });

  it("does not consult predictions in wall-sides mode", () => {
    const predictions = [{ label: 2, point: { x: 2, y: 2 } }];
    expect(
      label(
        undefined,
        predictions,
        makeConfig({ label_assignment: "wall-sides", unknown_room_label: "room" }),
      ),
    ).toEqual([
      ["room", "none"],
      ["room", "none"],
    ]);
  });
});
