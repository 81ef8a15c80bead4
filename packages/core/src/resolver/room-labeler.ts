import { distance, pointInRings } from "../geometry/polygon.js";
import type { ConverterConfig } from "../types/config.js";
import type {
  ExtractedFace,
  FaceExtraction,
  LabelSource,
  RoomLabelPrediction,
  WallGraph,
} from "../types/geometry.js";

/**
 * Assign a room-type label to every extracted face.
 *
 * - "wall-sides": majority vote over the detector's per-side wall labels.
 *   Every face lies on the left of its half-edges, hole outlines included:
 *   forward half-edges read `left`, reverse ones `right`.
 * - "centroid": the prediction inside the face nearest to its centroid.
 * - "auto": wall sides when any vote exists, centroid otherwise.
 *
 * Labels listed in `excluded_room_labels` never name a room. Faces with no
 * usable prediction keep `unknown_room_label`.
 */
export function assignRoomLabels(
  graph: WallGraph,
  extraction: FaceExtraction,
  predictions: RoomLabelPrediction[],
  config: ConverterConfig,
): FaceExtraction {
  const excluded = new Set(
    config.room_type_labels
      .map((label, i) => (config.excluded_room_labels.includes(label) ? i : -1))
      .filter((i) => i !== -1),
  );

  const faces = extraction.faces.map((face): ExtractedFace => {
    const fromWalls =
      config.label_assignment === "centroid"
        ? null
        : voteWallSides(graph, face, excluded);
    const fromCentroid =
      config.label_assignment === "wall-sides" || fromWalls !== null
        ? null
        : nearestPrediction(face, predictions, excluded);

    let label = config.unknown_room_label;
    let labelSource: LabelSource = "none";
    if (fromWalls !== null) {
      label = config.room_type_labels[fromWalls];
      labelSource = "wall-sides";
    } else if (fromCentroid !== null) {
      label = config.room_type_labels[fromCentroid];
      labelSource = "centroid";
    }

    return { ...face, label, labelSource };
  });

  return { ...extraction, faces };
}

/** Most voted label index; ties go to the earlier label. */
function voteWallSides(
  graph: WallGraph,
  face: ExtractedFace,
  excluded: Set<number>,
): number | null {
  const votes = new Map<number, number>();
  for (const h of [...face.halfEdges, ...face.holeHalfEdges.flat()]) {
    const segment = graph.segments[h >> 1];
    const label =
      h % 2 === 0 ? segment.sideLabels.left : segment.sideLabels.right;
    if (label === undefined || excluded.has(label)) continue;
    votes.set(label, (votes.get(label) ?? 0) + 1);
  }

  let best: number | null = null;
  let bestCount = 0;
  for (const [label, count] of votes) {
    if (
      count > bestCount ||
      (count === bestCount && best !== null && label < best)
    ) {
      best = label;
      bestCount = count;
    }
  }
  return best;
}

function nearestPrediction(
  face: ExtractedFace,
  predictions: RoomLabelPrediction[],
  excluded: Set<number>,
): number | null {
  let best: number | null = null;
  let bestDistance = Infinity;
  for (const prediction of predictions) {
    if (excluded.has(prediction.label)) continue;
    if (!pointInRings(prediction.point, face.vertices, face.holes)) continue;
    const d = distance(prediction.point, face.centroid);
    if (d < bestDistance) {
      best = prediction.label;
      bestDistance = d;
    }
  }
  return best;
}
