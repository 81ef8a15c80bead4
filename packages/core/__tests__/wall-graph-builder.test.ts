import { describe, expect, it } from "vitest";
import { GeometryError, IssueCollector } from "../src/errors.js";
import { normalizeDetectorOutput } from "../src/resolver/coordinate-normalizer.js";
import {
  buildWallGraph,
  snapCorners,
} from "../src/resolver/wall-graph-builder.js";
import type { DetectorOutput } from "../src/types/config.js";
import { makeConfig, twoRooms, wall } from "./fixtures.js";

function build(detector: DetectorOutput, config = makeConfig()) {
  const issues = new IssueCollector();
  const plan = normalizeDetectorOutput(detector, config);
  const graph = buildWallGraph(plan.corners, plan.walls, config, issues);
  return { graph, diagnostics: issues.toDiagnostics() };
}

describe("snapCorners", () => {
  it("merges corners within the Chebyshev tolerance, closest first", () => {
    const { nodes, cornerToNode } = snapCorners(
      [
        { x: 0, y: 0 },
        { x: 0.03, y: -0.02 },
        { x: 0.06, y: 0 },
        { x: 0.05, y: 0 },
      ],
      0.05,
    );
    expect(cornerToNode).toEqual([0, 0, 1, 1]);
    expect(nodes).toEqual([
      { x: 0, y: 0 },
      { x: 0.06, y: 0 },
    ]);
  });
});

describe("buildWallGraph", () => {
  it("builds nodes, segments, incidence and one component", () => {
    const { graph, diagnostics } = build(twoRooms());

    expect(graph.nodes).toHaveLength(6);
    expect(graph.segments.map((s) => s.id)).toEqual([
      "wall_0",
      "wall_1",
      "wall_2",
      "wall_3",
      "wall_4",
      "wall_5",
      "wall_6",
    ]);
    expect(graph.incident[1]).toEqual([0, 1, 6]);
    expect(graph.components).toEqual([[0, 1, 2, 3, 4, 5]]);
    expect(graph.segments[6].thickness).toBe(0.1);
    expect(diagnostics.warnings).toEqual([]);
  });

  it("throws GeometryError for a missing corner", () => {
    expect(() =>
      build({ corners: [[0, 0]], walls: [wall(0, 3)], icons: [] }),
    ).toThrow(GeometryError);
  });

  it("drops degenerate and duplicate walls with warnings", () => {
    const { graph, diagnostics } = build({
      corners: [
        [0, 0],
        [0.01, 0],
        [3, 0],
      ],
      walls: [wall(0, 1), wall(0, 2), wall(2, 0)],
      icons: [],
    });

    expect(graph.segments).toHaveLength(1);
    expect(graph.segments[0].sourceIndex).toBe(1);
    expect(diagnostics.warnings.map((w) => w.code)).toEqual([
      "degenerate-wall",
      "duplicate-wall",
    ]);
    expect(diagnostics.warnings[0].elementId).toBe("wall-input-0");
  });

  it("splits walls at T-junctions in place", () => {
    // Outer 8 x 4 rectangle with a partition from (4,0) to (4,4); the
    // partition ends lie on the bottom and top walls.
    const { graph } = build({
      corners: [
        [0, 0],
        [8, 0],
        [8, 4],
        [0, 4],
        [4, 0],
        [4, 4],
      ],
      walls: [wall(0, 1), wall(1, 2), wall(2, 3), wall(3, 0), wall(4, 5)],
      icons: [],
    });

    expect(graph.segments.map((s) => [s.start, s.end])).toEqual([
      [0, 4],
      [4, 1],
      [1, 2],
      [2, 5],
      [5, 3],
      [3, 0],
      [4, 5],
    ]);
    expect(graph.segments.map((s) => s.sourceIndex)).toEqual([
      0, 0, 1, 2, 2, 3, 4,
    ]);
  });

  it("leaves T-junctions alone when splitting is disabled", () => {
    const { graph } = build(
      {
        corners: [
          [0, 0],
          [8, 0],
          [4, 0],
          [4, 4],
        ],
        walls: [wall(0, 1), wall(2, 3)],
        icons: [],
      },
      makeConfig({ split_walls: { enabled: false } }),
    );
    expect(graph.segments).toHaveLength(2);
  });

  it("warns when splitting runs out of iterations", () => {
    const { graph, diagnostics } = build(
      {
        corners: [
          [0, 0],
          [8, 0],
          [2, 0],
          [2, 2],
          [6, 0],
          [6, 2],
        ],
        walls: [wall(0, 1), wall(2, 3), wall(4, 5)],
        icons: [],
      },
      makeConfig({ split_walls: { max_iter: 1 } }),
    );
    expect(graph.segments).toHaveLength(4);
    expect(diagnostics.warnings.map((w) => w.code)).toEqual([
      "split-walls-truncated",
    ]);
  });

  it("straightens nearly axis-aligned walls when enabled", () => {
    const { graph } = build(
      {
        corners: [
          [0, 0],
          [4, 0.1],
        ],
        walls: [wall(0, 1)],
        icons: [],
      },
      makeConfig({ straighten_walls: { enabled: true } }),
    );
    expect(graph.nodes[1]).toEqual({ x: 4, y: 0 });
  });

  it("merges nodes that straightening moves onto each other", () => {
    // Corner 2 sits 0.1 above corner 1; straightening the wall from
    // corner 0 drops it onto corner 1.
    const { graph, diagnostics } = build(
      {
        corners: [
          [0, 0],
          [4, 0],
          [4, 0.1],
          [4, 4],
        ],
        walls: [wall(0, 1), wall(0, 2), wall(2, 3), wall(1, 2)],
        icons: [],
      },
      makeConfig({ straighten_walls: { enabled: true } }),
    );

    expect(graph.nodes[2]).toEqual({ x: 4, y: 0 });
    expect(
      graph.segments.map((s) => [s.start, s.end, s.sourceIndex]),
    ).toEqual([
      [0, 1, 0],
      [1, 3, 2],
    ]);
    expect(graph.segments.map((s) => s.id)).toEqual(["wall_0", "wall_1"]);
    expect(graph.componentOf).toEqual([0, 0, -1, 0]);
    expect(diagnostics.warnings.map((w) => [w.code, w.elementId])).toEqual([
      ["duplicate-wall", "wall-input-1"],
      ["degenerate-wall", "wall-input-3"],
    ]);
  });

  it("keeps isolated corners out of every component", () => {
    const { graph } = build({
      corners: [
        [0, 0],
        [2, 0],
        [9, 9],
      ],
      walls: [wall(0, 1)],
      icons: [],
    });
    expect(graph.componentOf).toEqual([0, 0, -1]);
    expect(graph.components).toEqual([[0, 1]]);
  });
});
