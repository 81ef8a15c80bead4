import { describe, expect, it } from "vitest";
import { buildObjectBoxes } from "../src/resolver/object-resolver.js";
import type { OpeningIcon } from "../src/types/geometry.js";

function makeIcon(index: number, cls: string, x = 0): OpeningIcon {
  return { index, class: cls, box: { x, y: 0, width: 1, height: 1 } };
}

describe("buildObjectBoxes", () => {
  it("keeps non-opening icons and appends unmatched openings", () => {
    const icons = [
      makeIcon(0, "door"),
      makeIcon(1, "toilet", 2),
      makeIcon(2, "window"),
      makeIcon(3, "stairs", 5),
      makeIcon(4, "entrance", 7),
    ];
    const objects = buildObjectBoxes(icons, [icons[2]], {
      ignored_icon_classes: ["stairs"],
      entrance_classes: ["entrance"],
    });

    expect(objects).toEqual([
      {
        class: "toilet",
        box: { x: 2, y: 0, width: 1, height: 1 },
        source: "icon",
        sourceIndex: 1,
      },
      {
        class: "window",
        box: { x: 0, y: 0, width: 1, height: 1 },
        source: "unmatched-opening",
        sourceIndex: 2,
      },
    ]);
  });

  it("returns nothing for an empty plan", () => {
    expect(buildObjectBoxes([], [], { ignored_icon_classes: [], entrance_classes: [] })).toEqual([]);
  });
});
