import type { ConverterConfig } from "../types/config.js";
import type { ObjectBox, OpeningIcon } from "../types/geometry.js";
import { isOpeningType } from "./opening-resolver.js";

/**
 * Object boxes: every icon that is not a door, window or entrance marker
 * (minus `ignored_icon_classes`), followed by the openings no wall would
 * host.
 */
export function buildObjectBoxes(
  icons: OpeningIcon[],
  unmatched: OpeningIcon[],
  config: Pick<ConverterConfig, "ignored_icon_classes" | "entrance_classes">,
): ObjectBox[] {
  const objects: ObjectBox[] = icons
    .filter(
      (icon) =>
        !isOpeningType(icon.class) &&
        !config.entrance_classes.includes(icon.class) &&
        !config.ignored_icon_classes.includes(icon.class),
    )
    .map((icon) => ({
      class: icon.class,
      box: { ...icon.box },
      source: "icon",
      sourceIndex: icon.index,
    }));

  for (const icon of unmatched) {
    objects.push({
      class: icon.class,
      box: { ...icon.box },
      source: "unmatched-opening",
      sourceIndex: icon.index,
    });
  }

  return objects;
}
