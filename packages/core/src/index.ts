export * from "./types/config.js";
export * from "./types/geometry.js";
export * from "./errors.js";
export { parseConfig, resolveConfig, withOverrides } from "./parser/config-parser.js";
export { parseDetectorOutput, resolveLabelRef } from "./parser/detector-parser.js";
export {
  createNormalizer,
  normalizeDetectorOutput,
  pixelBoxToRect,
} from "./resolver/coordinate-normalizer.js";
export type { Normalizer } from "./resolver/coordinate-normalizer.js";
export { buildWallGraph, snapCorners } from "./resolver/wall-graph-builder.js";
export { extractFaces, facesOfSegment } from "./resolver/face-extractor.js";
export { assignRoomLabels } from "./resolver/room-labeler.js";
export { resolveOpenings, isOpeningType } from "./resolver/opening-resolver.js";
export { buildObjectBoxes } from "./resolver/object-resolver.js";
export { assembleScene, buildOverlays } from "./resolver/scene-assembler.js";
export type { AssembledScene } from "./resolver/scene-assembler.js";
export { convertFloorplan } from "./resolver/floorplan-converter.js";
export {
  toArchJson,
  toObjectAabbs,
  toSceneState,
  roomDoorRoomTriples,
} from "./export/scene-state.js";
export type {
  ArchJson,
  ObjectAabbJson,
  RdrTriple,
  SceneStateJson,
} from "./export/scene-state.js";
export { boundsOf, rectCenter, signedArea } from "./geometry/polygon.js";
