import type { BoundaryId } from "../types/index.js";
import type { Quad } from "../quad/quad.js";
import { OUTER_BOUNDARY_IDS } from "../constants.js";
import { TreeIntegrityError } from "../errors.js";
import { Boundary } from "./boundary.js";

/**
 * Groups the leaves of `root`'s tree by the lines their edges lie on: one
 * boundary per branch id and one per outer edge "a"–"d".
 */
export function calcBoundaries(root: Quad): Map<BoundaryId, Boundary> {
  const boundaries = new Map<BoundaryId, Boundary>();
  for (const branch of root.root.branches()) {
    boundaries.set(branch.id, new Boundary(branch.id));
  }
  for (const tag of OUTER_BOUNDARY_IDS) {
    boundaries.set(tag, new Boundary(tag));
  }

  for (const leaf of root.root.leafs()) {
    for (let edge = 0; edge < 4; edge++) {
      const id = leaf.boundaryId(edge);
      const boundary = boundaries.get(id);
      if (boundary === undefined) {
        throw new TreeIntegrityError(
          `Leaf "${leaf.id}" edge ${edge} resolves to unknown boundary "${id}"`,
        );
      }
      boundary.addEdge(leaf, edge);
    }
  }
  return boundaries;
}
