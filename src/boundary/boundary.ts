import type { BoundaryId, Point, Point3, Segment } from "../types/index.js";
import type { Quad } from "../quad/quad.js";
import { OUTER_BOUNDARY_IDS, OVERLAP_TOLERANCE } from "../constants.js";
import { angle2d, distance2d, wrapAngle } from "../geometry/vector.js";

/** A leaf quad touching a boundary along one of its edges. */
export interface Attachment {
  quad: Quad;
  edge: number;
}

interface EdgeMatch {
  edgeA: number;
  edgeB: number;
}

function isOuterId(id: BoundaryId): boolean {
  return OUTER_BOUNDARY_IDS.some((tag) => tag === id);
}

/**
 * One straight line of the floor plan, either a division line (identified
 * by the id of the quad it divides) or an outer edge of the root ("a"–"d"),
 * together with the leaves that touch it, in no particular order.
 */
export class Boundary {
  private readonly _attachments: Attachment[] = [];

  constructor(readonly id: BoundaryId) {}

  get attachments(): readonly Attachment[] {
    return this._attachments;
  }

  get isOuter(): boolean {
    return isOuterId(this.id);
  }

  addEdge(quad: Quad, edge: number): void {
    this._attachments.push({ quad, edge });
  }

  /** True when every attachment's edge resolves to this boundary's id. */
  get isValid(): boolean {
    return this._attachments.every(
      ({ quad, edge }) => quad.boundaryId(edge) === this.id,
    );
  }

  /**
   * Full length of the line: the division line of the quad it belongs to,
   * or the outer edge of the root. 0 when nothing is attached.
   */
  get lengthTotal(): number {
    const first = this._attachments[0];
    if (first === undefined) return 0;

    const root = first.quad.root;
    const tagIndex = OUTER_BOUNDARY_IDS.findIndex((tag) => tag === this.id);
    if (tagIndex >= 0) {
      return root.length(tagIndex - root.rotation);
    }

    const branch = root.byRelativeId(this.id);
    const a = branch?.coordinateA ?? null;
    const b = branch?.coordinateB ?? null;
    if (a === null || b === null) return 0;
    return distance2d(a, b);
  }

  // ---- pairwise queries ----

  /**
   * Length of wall shared by `a` and `b` along this boundary. 0 when either
   * is not attached or the two edges do not meet.
   */
  overlap(a: Quad, b: Quad): number {
    const match = this.findEdges(a, b);
    if (match === null) return 0;

    const { edgeA, edgeB } = match;
    const lengthA = a.length(edgeA);
    const lengthB = b.length(edgeB);
    const span = this.span(a, edgeA, b, edgeB).size;

    let shared: number;
    if (span <= lengthB) shared = lengthA;
    else if (span <= lengthA) shared = lengthB;
    else shared = lengthA + lengthB - span;

    return shared > OVERLAP_TOLERANCE ? shared : 0;
  }

  /**
   * Ends of the wall shared by `a` and `b`, ordered so that `a` is on the
   * left walking from the first point to the second. Null when they share
   * nothing.
   */
  coordinates(a: Quad, b: Quad): Segment | null {
    const match = this.findEdges(a, b);
    if (match === null || this.overlap(a, b) <= 0) return null;

    const { edgeA, edgeB } = match;
    const lengthA = a.length(edgeA);
    const lengthB = b.length(edgeB);
    const span = this.span(a, edgeA, b, edgeB);

    let c0: Point;
    let c1: Point;
    if (span.size <= lengthB) {
      c0 = a.coordinate(edgeA);
      c1 = a.coordinate(edgeA + 1);
    } else if (span.size <= lengthA) {
      c0 = b.coordinate(edgeB);
      c1 = b.coordinate(edgeB + 1);
    } else {
      // partial overlap: the two points inside the span
      c0 = span.innerA;
      c1 = span.innerB;
    }

    const rad = wrapAngle(angle2d(c1, c0) - angle2d(a.centroid, b.centroid));
    return rad > Math.PI ? [c0, c1] : [c1, c0];
  }

  /**
   * Direction the shared wall faces from `a`, in radians (east = 0,
   * north = π/2).
   */
  bearing(a: Quad, b: Quad): number | null {
    const segment = this.coordinates(a, b);
    if (segment === null) return null;
    return wrapAngle(angle2d(segment[0], segment[1]) - Math.PI / 2);
  }

  /** Midpoint of the shared wall, half way up `a`'s storey. */
  middle(a: Quad, b: Quad): Point3 | null {
    const segment = this.coordinates(a, b);
    if (segment === null) return null;
    const [c0, c1] = segment;
    return [
      0.5 * (c0[0] + c1[0]),
      0.5 * (c0[1] + c1[1]),
      a.elevation + 0.5 * a.height,
    ];
  }

  /**
   * Every pair of attached leaves sharing a wall here. Always empty for an
   * outer edge, which has nothing on its far side.
   */
  pairs(): Array<[Quad, Quad]> {
    if (this.isOuter) return [];

    const result: Array<[Quad, Quad]> = [];
    const items = this._attachments;
    for (let i = 0; i < items.length - 1; i++) {
      const a = items[i]!.quad;
      for (let j = i + 1; j < items.length; j++) {
        const b = items[j]!.quad;
        if (this.overlap(a, b) > 0) result.push([a, b]);
      }
    }
    return result;
  }

  /** As `pairs()`, shortest shared wall first. */
  pairsByLength(): Array<[Quad, Quad]> {
    return this.pairs()
      .map((pair) => ({ pair, size: this.overlap(pair[0], pair[1]) }))
      .sort((x, y) => x.size - y.size)
      .map((entry) => entry.pair);
  }

  // ---- internals ----

  private findEdges(a: Quad, b: Quad): EdgeMatch | null {
    if (a === b) return null;
    const edgeA = this._attachments.find((item) => item.quad === a)?.edge;
    const edgeB = this._attachments.find((item) => item.quad === b)?.edge;
    if (edgeA === undefined || edgeB === undefined) return null;
    if (a.boundaryId(edgeA) !== this.id || b.boundaryId(edgeB) !== this.id) {
      return null;
    }
    return { edgeA, edgeB };
  }

  /**
   * The farthest-apart pair of endpoints of the two edges, and the two
   * remaining endpoints, which lie inside that span.
   */
  private span(
    a: Quad,
    edgeA: number,
    b: Quad,
    edgeB: number,
  ): { size: number; innerA: Point; innerB: Point } {
    const a0 = a.coordinate(edgeA);
    const a1 = a.coordinate(edgeA + 1);
    const b0 = b.coordinate(edgeB);
    const b1 = b.coordinate(edgeB + 1);

    const candidates: Array<{ size: number; innerA: Point; innerB: Point }> = [
      { size: distance2d(a0, b0), innerA: a1, innerB: b1 },
      { size: distance2d(a0, b1), innerA: a1, innerB: b0 },
      { size: distance2d(a1, b0), innerA: a0, innerB: b1 },
      { size: distance2d(a1, b1), innerA: a0, innerB: b0 },
    ];

    let best = candidates[0]!;
    for (const candidate of candidates.slice(1)) {
      if (candidate.size > best.size) best = candidate;
    }
    return best;
  }
}
