import type {
  AreaMatch,
  BoundaryId,
  DivisionRatios,
  Point,
  Point3,
  Position,
  QuadInit,
  Rotation,
  Segment,
  WallEdge,
} from "../types/index.js";
import type { AdjacencyGraph } from "../graph/adjacency-graph.js";
import type { Boundary } from "../boundary/boundary.js";
import { calcBoundaries } from "../boundary/calc-boundaries.js";
import { buildGraph } from "../graph/build-graph.js";
import {
  DEFAULT_DIVISION,
  DEFAULT_STOREY_HEIGHT,
  OUTER_BOUNDARY_IDS,
} from "../constants.js";
import { InvalidGeometryError, TreeIntegrityError } from "../errors.js";
import { lineIntersection, pointsToLine } from "../geometry/line.js";
import {
  angle2d,
  distance2d,
  isBetween2d,
  lerp2d,
  normalise2d,
  scale2d,
  subtract2d,
  triangleArea,
  wrapAngle,
} from "../geometry/vector.js";
import { Polygon } from "../polygon/polygon.js";
import { Logger } from "../utils/logger.js";
import { Diagnostics } from "./diagnostics.js";

const ROTATIONS: readonly Rotation[] = [0, 1, 2, 3];

function mod4(n: number): number {
  return ((n % 4) + 4) % 4;
}

function isValidRatio(ratio: number): boolean {
  return Number.isFinite(ratio) && ratio > 0 && ratio < 1;
}

/**
 * A unit of architectural space: four straight edges, optionally divided in
 * two, forming a binary tree. Only leaves are actual spaces; branches are
 * containers.
 *
 * Corners are numbered anticlockwise from 0 and renumbered by the quad's
 * rotation. A root quad owns its corners; every other quad derives its
 * corners from its parent's corners and division line.
 *
 * A root may have another tree stacked above or below it (storeys). Storeys
 * share the footprint, rotation and, where both are divided, the division
 * lines of the storey beneath.
 *
 * Structural edits return `false` when refused and leave the tree unchanged.
 * All reads and writes must be serialised per vertical stack.
 */
export class Quad {
  private _parent: Quad | null = null;
  private _children: [Quad, Quad] | null = null;
  /** Vertical links, only meaningful on roots. */
  private _above: Quad | null = null;
  private _below: Quad | null = null;

  /** Unrotated corners of a root quad; null below the root. */
  private _corners: Point[] | null = null;
  /** Derived corners of a non-root quad, indexed by unrotated corner. */
  private _cornerCache: Array<Point | null> = [null, null, null, null];
  private _perimeterCache: number | null = null;
  private _idCache: string | null = null;

  private _rotation: Rotation = 0;
  private _division: DivisionRatios | null = null;
  private _elevation: number | null = null;
  private _height: number | null = null;
  private _type: string | null = null;

  style: string | null = null;
  wallInner = false;
  wallOuter = false;

  readonly diagnostics = new Diagnostics();

  private constructor() {}

  /**
   * Creates a root quad from four corners listed anticlockwise.
   * @throws {InvalidGeometryError}
   */
  static create(init: QuadInit): Quad {
    if (init.corners.length !== 4) {
      throw new InvalidGeometryError(
        `A root quad needs exactly 4 corners, got ${init.corners.length}`,
      );
    }
    for (const corner of init.corners) {
      if (!Number.isFinite(corner[0]) || !Number.isFinite(corner[1])) {
        throw new InvalidGeometryError(
          `Corner [${corner[0]}, ${corner[1]}] is not finite`,
        );
      }
    }
    if (init.height !== undefined && !(init.height > 0)) {
      throw new InvalidGeometryError(
        `Storey height must be positive, got ${init.height}`,
      );
    }

    const quad = new Quad();
    quad._corners = init.corners.map((c): Point => [c[0], c[1]]);
    quad._elevation = init.elevation ?? null;
    quad._height = init.height ?? null;
    quad._type = init.type ?? null;
    quad.style = init.style ?? null;
    return quad;
  }

  // ============================================================
  // Tree structure
  // ============================================================

  get parent(): Quad | null {
    return this._parent;
  }

  /** The two direct children, or an empty list for a leaf. */
  get children(): readonly Quad[] {
    return this._children ?? [];
  }

  get left(): Quad | null {
    return this._children?.[0] ?? null;
  }

  get right(): Quad | null {
    return this._children?.[1] ?? null;
  }

  get divided(): boolean {
    return this._children !== null && this._division !== null;
  }

  get division(): DivisionRatios | null {
    return this._division;
  }

  get root(): Quad {
    let node: Quad = this;
    while (node._parent !== null) {
      node = node._parent;
    }
    return node;
  }

  /** "l" or "r" under the parent, "" for a root. */
  get position(): Position {
    const parent = this._parent;
    if (parent === null) return "";
    if (parent._children?.[0] === this) return "l";
    if (parent._children?.[1] === this) return "r";
    throw new TreeIntegrityError("Quad is not among its parent's children");
  }

  /**
   * Address relative to the root: "" for the root, then one "l" or "r" per
   * level, e.g. "rl". Usable with `byId()`.
   */
  get id(): string {
    const parent = this._parent;
    if (parent === null) return "";
    if (this._idCache === null) {
      this._idCache = parent.id + this.position;
    }
    return this._idCache;
  }

  /** Ancestors, nearest first. */
  parents(): Quad[] {
    const result: Quad[] = [];
    let node = this._parent;
    while (node !== null) {
      result.push(node);
      node = node._parent;
    }
    return result;
  }

  /** Leaf quads of this subtree, including self if undivided. */
  leafs(): Quad[] {
    const children = this._children;
    if (children === null) return [this];
    return [...children[0].leafs(), ...children[1].leafs()];
  }

  /**
   * Branch quads of this subtree. An undivided root counts as a branch so
   * that its id still names a boundary.
   */
  branches(): Quad[] {
    const children = this._children;
    if (children === null) return this._parent === null ? [this] : [];
    return [this, ...children[0].branches(), ...children[1].branches()];
  }

  /** Self and all descendants, depth first. */
  subtree(): Quad[] {
    const children = this._children;
    if (children === null) return [this];
    return [this, ...children[0].subtree(), ...children[1].subtree()];
  }

  byRelativeId(path: string): Quad | null {
    let node: Quad = this;
    for (const step of path) {
      if (step !== "l" && step !== "r") continue;
      const children = node._children;
      if (children === null) return null;
      node = step === "l" ? children[0] : children[1];
    }
    return node;
  }

  /** Walks `path` from the root of this tree. */
  byId(path: string): Quad | null {
    return this.root.byRelativeId(path);
  }

  // ============================================================
  // Storeys
  // ============================================================

  /** The matching quad on the storey above, if that storey has one. */
  get above(): Quad | null {
    if (this._parent === null) return this._above;
    return this.root.above?.byId(this.id) ?? null;
  }

  /** The matching quad on the storey below, if that storey has one. */
  get below(): Quad | null {
    if (this._parent === null) return this._below;
    return this.root.below?.byId(this.id) ?? null;
  }

  get lowest(): Quad {
    let node: Quad = this;
    let next = node.below;
    while (next !== null) {
      node = next;
      next = node.below;
    }
    return node;
  }

  get highest(): Quad {
    let node: Quad = this;
    let next = node.above;
    while (next !== null) {
      node = next;
      next = node.above;
    }
    return node;
  }

  /** Storey roots below this one, nearest first. */
  levelsBelow(): Quad[] {
    const result: Quad[] = [];
    let node = this.root._below;
    while (node !== null) {
      result.push(node);
      node = node._below;
    }
    return result;
  }

  /** Storey roots above this one, nearest first. */
  levelsAbove(): Quad[] {
    const result: Quad[] = [];
    let node = this.root._above;
    while (node !== null) {
      result.push(node);
      node = node._above;
    }
    return result;
  }

  /** Storey index, 0 for the ground storey. */
  get level(): number {
    return this.levelsBelow().length;
  }

  /**
   * The quad below, or failing that the one below the nearest ancestor that
   * has a match. Null on the ground storey.
   */
  get belowMore(): Quad | null {
    if (this.root._below === null) return null;
    return this.below ?? this._parent?.belowMore ?? null;
  }

  get aboveMore(): Quad | null {
    if (this.root._above === null) return null;
    return this.above ?? this._parent?.aboveMore ?? null;
  }

  /** Leaves of the storey below overlapping this quad; a single leaf may be larger than this quad. */
  belowLeafs(): Quad[] {
    return this.belowMore?.leafs() ?? [];
  }

  aboveLeafs(): Quad[] {
    return this.aboveMore?.leafs() ?? [];
  }

  /** Walks `n` storeys up (n > 0) or down (n < 0). */
  byRelativeLevel(n: number): Quad | null {
    if (n === 0) return this;
    const next = n < 0 ? this.below : this.above;
    if (next === null) return null;
    return next.byRelativeLevel(n < 0 ? n + 1 : n - 1);
  }

  /** Walks `n` storeys from the ground storey. */
  byLevel(n: number): Quad | null {
    return this.lowest.byRelativeLevel(n);
  }

  // ============================================================
  // Attributes
  // ============================================================

  /** Free-form type tag, "" when unset. */
  get type(): string {
    return this._type ?? "";
  }

  set type(value: string) {
    this._type = value;
  }

  /** Rotation is read through from the storey below. */
  get rotation(): Rotation {
    return this.below?.rotation ?? this._rotation;
  }

  /** Ground storey stores its elevation; upper storeys sit on the one below. */
  get elevation(): number {
    const root = this.root;
    const below = root._below;
    if (below === null) return root._elevation ?? 0;
    return below.elevation + below.height;
  }

  get height(): number {
    return this.root._height ?? DEFAULT_STOREY_HEIGHT;
  }

  set height(value: number) {
    this.root._height = value;
    this.invalidateStack();
  }

  // ============================================================
  // Coordinates
  // ============================================================

  /** Corner `index` (anticlockwise, wraps modulo 4, renumbered by rotation). */
  coordinate(index: number): Point {
    const below = this.below;
    if (below !== null) return below.coordinate(index);

    const corner = mod4(index + this.rotation);
    const parent = this._parent;
    if (parent === null) {
      const corners = this._corners;
      if (corners === null) {
        throw new TreeIntegrityError("Root quad has no corners");
      }
      return corners[corner]!;
    }

    const cached = this._cornerCache[corner];
    if (cached !== null && cached !== undefined) return cached;

    const derived = this.deriveCorner(corner, parent);
    this._cornerCache[corner] = derived;
    return derived;
  }

  /** Start of the division line, on edge 0→1. Null for a leaf. */
  get coordinateA(): Point | null {
    return this.divisionLine()?.[0] ?? null;
  }

  /** End of the division line, on edge 3→2. Null for a leaf. */
  get coordinateB(): Point | null {
    return this.divisionLine()?.[1] ?? null;
  }

  /**
   * Corner `index` moved by `offset` along the corner bisector: positive is
   * outside, negative is inside. Without an offset this is `coordinate()`.
   */
  coordinateOffset(index: number, offset?: number): Point {
    const corner = this.coordinate(index);
    if (offset === undefined) return corner;

    const next = this.coordinate(index + 1);
    const halfAngle = 0.5 * this.angle(index);
    const heading = angle2d(corner, next) + halfAngle;
    const shift = scale2d(offset / Math.sin(halfAngle), [
      Math.cos(heading),
      Math.sin(heading),
    ]);
    return subtract2d(corner, shift);
  }

  /** Lower-left of the bounding box. */
  get min(): Point {
    const corners = this.corners();
    return [
      Math.min(...corners.map((c) => c[0])),
      Math.min(...corners.map((c) => c[1])),
    ];
  }

  /** Upper-right of the bounding box. */
  get max(): Point {
    const corners = this.corners();
    return [
      Math.max(...corners.map((c) => c[0])),
      Math.max(...corners.map((c) => c[1])),
    ];
  }

  /** Mean of the four corners. */
  get centroid(): Point {
    const corners = this.corners();
    let x = 0;
    let y = 0;
    for (const c of corners) {
      x += c[0];
      y += c[1];
    }
    return [0.25 * x, 0.25 * y];
  }

  /** Unit vector along the division line. Null for a leaf. */
  get orientation(): Point | null {
    const line = this.divisionLine();
    if (line === null) return null;
    return normalise2d(subtract2d(line[1], line[0]));
  }

  get orientationPerpendicular(): Point | null {
    const orientation = this.orientation;
    if (orientation === null) return null;
    return [-orientation[1], orientation[0]];
  }

  // ============================================================
  // Measurements
  // ============================================================

  /** Length of edge `index`, from corner `index` to corner `index + 1`. */
  length(index = 0): number {
    return distance2d(this.coordinate(index), this.coordinate(index + 1));
  }

  /** Edge indices, shortest edge first. */
  byLength(): number[] {
    return [0, 1, 2, 3]
      .map((index) => ({ index, size: this.length(index) }))
      .sort((a, b) => a.size - b.size)
      .map((e) => e.index);
  }

  get lengthNarrowest(): number {
    return Math.min(
      this.length(0),
      this.length(1),
      this.length(2),
      this.length(3),
    );
  }

  /** Ratio of opposite edge sums, always ≥ 1 (1.0 is 1:1, 2.0 is 2:1). */
  get aspect(): number {
    const aspect =
      (this.length(0) + this.length(2)) / (this.length(1) + this.length(3));
    if (aspect > 0 && aspect < 1) return 1 / aspect;
    return aspect;
  }

  /** Interior angle at corner `index`, in radians. */
  angle(index: number): number {
    const a = this.length(index);
    const b = this.length(index - 1);
    const c = distance2d(this.coordinate(index + 1), this.coordinate(index - 1));
    const cosine = (a * a + b * b - c * c) / (2 * a * b);
    return Math.acos(Math.max(-1, Math.min(1, cosine)));
  }

  /** Outward normal of edge `index` in radians: 0 is east, π/2 is north. */
  bearing(index: number): number {
    const [x, y] = subtract2d(this.coordinate(index + 1), this.coordinate(index));
    return wrapAngle(Math.atan2(y, x) - Math.PI / 2);
  }

  /** Midpoint of edge `index`, half way up the storey. */
  middle(index: number): Point3 {
    const a = this.coordinate(index);
    const b = this.coordinate(index + 1);
    return [
      0.5 * (a[0] + b[0]),
      0.5 * (a[1] + b[1]),
      this.elevation + 0.5 * this.height,
    ];
  }

  get area(): number {
    const [c0, c1, c2, c3] = this.corners();
    return triangleArea(c0, c1, c2) + triangleArea(c0, c2, c3);
  }

  /** Sum of the four edge lengths. */
  get perimeter(): number {
    if (this._perimeterCache === null) {
      this._perimeterCache =
        this.length(0) + this.length(1) + this.length(2) + this.length(3);
    }
    return this._perimeterCache;
  }

  /** The footprint as a polygon, corners in rotated order. */
  get polygon(): Polygon {
    return new Polygon(this.corners());
  }

  /**
   * Which boundary edge `index` lies on: the id of the ancestor whose
   * division forms it, or "a"–"d" for the outer edges of the root.
   */
  boundaryId(index = 0): BoundaryId {
    const edge = mod4(index + this.rotation);
    const parent = this._parent;
    if (parent === null) return OUTER_BOUNDARY_IDS[edge]!;

    const position = this.position;
    if ((position === "l" && edge === 1) || (position === "r" && edge === 3)) {
      return parent.id;
    }
    return parent.boundaryId(edge);
  }

  /**
   * Every quad on this storey and the storeys above, paired with how far its
   * area is from `reference` (a ratio ≥ 1), closest first.
   */
  byArea(reference = 0.0001): AreaMatch<Quad>[] {
    const storeys = [this.root, ...this.levelsAbove()];
    return storeys
      .flatMap((storey) => storey.subtree())
      .map((quad) => {
        const ratio = quad.area / reference;
        return { ratio: ratio < 1 ? 1 / ratio : ratio, quad };
      })
      .sort((a, b) => a.ratio - b.ratio);
  }

  /** Boundaries of this tree, keyed by boundary id. */
  calcBoundaries(): Map<BoundaryId, Boundary> {
    return calcBoundaries(this.root);
  }

  /** Adjacency graph of this tree's leaves, keyed by leaf id. */
  graph(threshold?: number): AdjacencyGraph<WallEdge> {
    return buildGraph(this.root, threshold);
  }

  /**
   * Smallest run of consecutive corners touched by every wall shared with
   * `neighbours`, i.e. where a stair cannot go. Indices are consecutive and
   * may exceed 3; lookups wrap modulo 4.
   */
  cornersInUse(
    graph: AdjacencyGraph<WallEdge>,
    neighbours: readonly string[],
  ): number[] {
    const walls: Segment[] = [];
    for (const neighbour of neighbours) {
      const wall = graph.edgeProperties(this.id, neighbour)?.coordinates;
      if (wall !== undefined) walls.push(wall);
    }

    const onWall = (point: Point, wall: Segment): boolean =>
      isBetween2d(point, wall[0], wall[1]);
    const edgeMeetsWall = (i: number, wall: Segment): boolean => {
      const from = this.coordinate(i);
      const to = this.coordinate(i + 1);
      return (
        onWall(from, wall) ||
        onWall(to, wall) ||
        isBetween2d(wall[0], from, to) ||
        isBetween2d(wall[1], from, to)
      );
    };

    for (let i = 0; i < 4; i++) {
      if (walls.every((wall) => onWall(this.coordinate(i), wall))) {
        return [i];
      }
    }
    for (let i = 0; i < 4; i++) {
      if (walls.every((wall) => edgeMeetsWall(i, wall))) {
        return [i, i + 1];
      }
    }
    for (let i = 0; i < 4; i++) {
      if (
        walls.every((wall) => edgeMeetsWall(i, wall) || edgeMeetsWall(i + 1, wall))
      ) {
        return [i, i + 1, i + 2];
      }
    }
    return [0, 1, 2, 3];
  }

  // ============================================================
  // Cache invalidation
  // ============================================================

  /**
   * Clears derived caches of this subtree. From an unparented root the walk
   * continues into the storey above. Root corners are authoritative and kept.
   */
  invalidate(): void {
    this._cornerCache = [null, null, null, null];
    this._perimeterCache = null;
    this._idCache = null;

    if (this._parent === null) {
      this._above?.invalidate();
    }

    const children = this._children;
    if (children !== null) {
      children[0].invalidate();
      children[1].invalidate();
    }
  }

  /** Invalidates the whole vertical stack this quad belongs to. */
  private invalidateStack(): void {
    this.root.lowest.root.invalidate();
  }

  // ============================================================
  // Structural edits
  // ============================================================

  /**
   * Divides this quad in two. `ratios` default to [0.5, 0.5].
   *
   * An already divided quad keeps its children: given `ratios` it moves its
   * division line and returns true, otherwise it returns false.
   */
  divide(ratios?: DivisionRatios): boolean {
    if (ratios !== undefined && !(isValidRatio(ratios[0]) && isValidRatio(ratios[1]))) {
      Logger.debug(
        `divide refused on "${this.id}": ratios [${ratios[0]}, ${ratios[1]}] outside (0, 1)`,
      );
      return false;
    }

    if (this._children !== null) {
      if (ratios === undefined) return false;
      this._division = [ratios[0], ratios[1]];
      this.invalidateStack();
      return true;
    }

    this._division = ratios === undefined ? DEFAULT_DIVISION : [ratios[0], ratios[1]];
    this._children = [this.spawnChild(), this.spawnChild()];
    this.invalidateStack();
    return true;
  }

  /**
   * Discards both children (and their descendants). When the storey above is
   * divided here as well, it is re-divided with this quad's ratios first.
   */
  undivide(): boolean {
    const children = this._children;
    const division = this._division;
    if (children === null || division === null) return false;

    children[0].undivide();
    children[1].undivide();

    const above = this.above;
    if (above !== null && above.divided) {
      above.divide(division);
    }

    children[0]._parent = null;
    children[1]._parent = null;
    this._children = null;
    this._division = null;
    this.invalidateStack();
    return true;
  }

  /** Quarter turn anticlockwise; applied to the ground storey's matching quad. */
  rotate(): boolean {
    return this.turn(1);
  }

  /** Quarter turn clockwise. */
  unrotate(): boolean {
    return this.turn(-1);
  }

  /** Exchanges left and right children. */
  swap(): boolean {
    const children = this._children;
    if (children === null) return false;
    this._children = [children[1], children[0]];
    this.invalidateStack();
    return true;
  }

  /**
   * Pure deep copy of this subtree as an independent root: no parent, no
   * storeys. Corners, rotation and division lines are fixed to their current
   * absolute values. The source tree is left untouched.
   */
  copy(): Quad {
    const twin = this.duplicate(true);
    if (this._parent === null && this._below === null) {
      const source: readonly Point[] = this._corners ?? this.corners();
      twin._corners = source.map((c): Point => [c[0], c[1]]);
      twin._rotation = this._rotation;
    } else {
      twin._corners = this.corners();
      twin._rotation = 0;
    }
    twin._elevation = this.elevation;
    twin._height = this.height;
    return twin;
  }

  /**
   * Removes this quad from its tree and turns it into an independent root
   * with its current geometry.
   *
   * A child is taken from its parent, which becomes a leaf (the sibling
   * subtree is discarded), and the storeys above the ground storey are
   * dropped. An upper storey root is unlinked from the storey below and
   * loses the storeys above it. Returns false for a quad that is already an
   * independent root.
   */
  detach(): boolean {
    const parent = this._parent;
    const below = this._below;
    if (parent === null && below === null) return false;

    const twin = this.copy();

    if (parent !== null) {
      const ground = this.root.lowest.root;
      ground.delAbove();
      const children = parent._children;
      if (this._parent === parent && children !== null) {
        const sibling = children[0] === this ? children[1] : children[0];
        sibling.undivide();
        sibling._parent = null;
        this._parent = null;
        parent._children = null;
        parent._division = null;
      }
      ground.invalidate();
    } else if (below !== null) {
      this.delAbove();
      below._above = null;
      this._below = null;
      below.invalidateStack();
    }

    this.takeContent(twin);
    this._corners = twin._corners;
    this._elevation = twin._elevation;
    this._height = twin._height;
    this.invalidate();
    return true;
  }

  /**
   * Copies this subtree into an independent tree and detaches the source
   * from its own tree (see `detach()`). Use `copy()` to leave the source
   * alone.
   */
  clone(): Quad {
    const twin = this.copy();
    this.detach();
    return twin;
  }

  /**
   * Exchanges subtree, division, rotation and attributes with `other`,
   * keeping each quad's place in its tree, its coordinates and its storey
   * height and elevation. Refused when
   * one quad is an ancestor of the other.
   */
  crossover(other: Quad): boolean {
    if (other === this) return false;
    if (this.parents().includes(other) || other.parents().includes(this)) {
      Logger.debug(
        `crossover refused between "${this.id}" and "${other.id}": one contains the other`,
      );
      return false;
    }

    const incoming = other.duplicate(false);
    const outgoing = this.duplicate(false);

    this.undivide();
    if (this._parent === null) this.delAbove();
    this.takeContent(incoming);

    other.undivide();
    if (other._parent === null) other.delAbove();
    other.takeContent(outgoing);

    this.invalidateStack();
    other.invalidateStack();
    return true;
  }

  /**
   * When either child has an edge shorter than `width`, replaces this quad's
   * content with that of the other child and re-straightens the result.
   */
  collapse(width: number): boolean {
    const children = this._children;
    if (children === null) return false;

    const [left, right] = children;
    let keep: Quad | null = null;
    if (left.lengthNarrowest < width) keep = right;
    else if (right.lengthNarrowest < width) keep = left;
    if (keep === null) return false;

    const content = keep.duplicate(false);
    this.undivide();
    this.crossover(content);
    this.straightenRecursive();
    return true;
  }

  /**
   * Aligns the division line with the parent's division line: parallel at
   * rotation 0 or 2, perpendicular at 1 or 3. Refused for roots, leaves and
   * when the aligned line would leave the quad.
   */
  straighten(): boolean {
    const parent = this._parent;
    if (parent === null || !this.divided) return false;

    const orientation =
      this.rotation % 2 === 0
        ? parent.orientation
        : parent.orientationPerpendicular;
    if (orientation === null) return false;
    return this.alignDivision(orientation);
  }

  /**
   * Aligns a root's division line with outer edge `reference` (0–3):
   * perpendicular for edges 0 and 2, parallel for 1 and 3.
   */
  straightenRoot(reference = 0): boolean {
    if (this._parent !== null || !this.divided) return false;

    let orientation = normalise2d(
      subtract2d(this.coordinate(reference), this.coordinate(reference + 1)),
    );
    if (mod4(reference) % 2 === 0) {
      orientation = [-orientation[1], orientation[0]];
    }
    return this.alignDivision(orientation);
  }

  /**
   * Straightens this quad and every descendant, roots against edge
   * `reference`, continuing into the storeys above a root. Apply to the root
   * to straighten the whole tree.
   */
  straightenRecursive(reference = 0): boolean {
    for (const quad of this.subtree()) {
      if (quad._parent !== null) {
        quad.straighten();
      } else {
        quad.straightenRoot(reference);
        quad._above?.straightenRecursive(reference);
      }
    }
    return true;
  }

  /**
   * Moves the whole building by (x, y) and its elevation by z. Always applied
   * to the ground storey, which every storey above follows.
   */
  shift(x: number, y: number, z = 0): boolean {
    const ground = this.root.lowest.root;
    const corners = ground._corners;
    if (corners === null) {
      throw new TreeIntegrityError("Ground storey root has no corners");
    }
    ground._corners = corners.map((c): Point => [c[0] + x, c[1] + y]);
    ground._elevation = (ground._elevation ?? 0) + z;
    ground.invalidate();
    return true;
  }

  // ---- storey stacking ----

  /** Adds an undivided storey above this tree. Refused if one exists. */
  addAbove(): boolean {
    const root = this.root;
    if (root._above !== null) return false;

    const storey = new Quad();
    storey._corners = root.groundCorners();
    storey._below = root;
    root._above = storey;
    root.invalidateStack();
    return true;
  }

  /** Removes every storey above this tree. */
  delAbove(): boolean {
    const root = this.root;
    const above = root._above;
    if (above === null) return false;

    above.delAbove();
    above.undivide();
    above._below = null;
    root._above = null;
    root.invalidateStack();
    return true;
  }

  /**
   * Replaces every storey above this tree with a single copy of this storey.
   */
  cloneAbove(): boolean {
    const root = this.root;
    const storey = root.copy();
    root.delAbove();

    storey._below = root;
    root._above = storey;
    root.invalidateStack();
    return true;
  }

  /**
   * Exchanges layout, attributes and height of this storey root with the
   * storey directly above, keeping both in place in the stack.
   */
  swapAbove(): boolean {
    if (this._parent !== null) return false;
    const above = this._above;
    if (above === null) return false;

    const mine = this.duplicate(false);
    const theirs = above.duplicate(false);
    this.takeContent(theirs);
    above.takeContent(mine);
    [this._height, above._height] = [above._height, this._height];
    this.invalidateStack();
    return true;
  }

  // ---- diagnostics ----

  fail(message: string): void {
    Logger.debug(`quad "${this.id}": ${message}`);
    this.diagnostics.fail(message);
  }

  failReset(): void {
    this.diagnostics.reset();
  }

  failures(): string[] {
    return this.diagnostics.failures();
  }

  // ============================================================
  // Private helpers
  // ============================================================

  private corners(): [Point, Point, Point, Point] {
    return [
      this.coordinate(0),
      this.coordinate(1),
      this.coordinate(2),
      this.coordinate(3),
    ];
  }

  /** Division line ends, deferring to the storey below when it is divided here too. */
  private divisionLine(): Segment | null {
    const division = this._division;
    if (this._children === null || division === null) return null;

    const below = this.below;
    if (below !== null && below.divided) return below.divisionLine();

    return [
      lerp2d(this.coordinate(0), this.coordinate(1), division[0]),
      lerp2d(this.coordinate(3), this.coordinate(2), division[1]),
    ];
  }

  /** The division this quad shows, which may be the storey below's. */
  private effectiveDivision(): DivisionRatios | null {
    const below = this.below;
    if (below !== null && below.divided) return below.effectiveDivision();
    return this._division;
  }

  /**
   * Moves the far end of the division line (on edge 3→2) so the line runs
   * along `orientation` from its near end. Refused when that point falls
   * outside edge 3→2.
   */
  private alignDivision(orientation: Point): boolean {
    const start = this.coordinateA;
    const division = this._division;
    if (start === null || division === null) return false;

    const c2 = this.coordinate(2);
    const c3 = this.coordinate(3);
    const meet = lineIntersection(
      pointsToLine(start, subtract2d(start, orientation)),
      pointsToLine(c2, c3),
    );
    if (meet === null) return false;

    const full = subtract2d(c2, c3);
    const partial = subtract2d(meet, c3);
    const ratio =
      Math.abs(full[0]) > Math.abs(full[1])
        ? partial[0] / full[0]
        : partial[1] / full[1];
    if (!isValidRatio(ratio)) {
      Logger.debug(`straighten refused on "${this.id}": ratio ${ratio}`);
      return false;
    }

    this._division = [division[0], ratio];
    this.invalidateStack();
    return true;
  }

  private deriveCorner(corner: number, parent: Quad): Point {
    const line = parent.divisionLine();
    if (line === null) {
      throw new TreeIntegrityError(
        `Quad "${this.id}" sits under an undivided parent`,
      );
    }

    if (this.position === "l") {
      switch (corner) {
        case 0:
          return parent.coordinate(0);
        case 1:
          return line[0];
        case 2:
          return line[1];
        default:
          return parent.coordinate(3);
      }
    }
    switch (corner) {
      case 0:
        return line[0];
      case 1:
        return parent.coordinate(1);
      case 2:
        return parent.coordinate(2);
      default:
        return line[1];
    }
  }

  private spawnChild(): Quad {
    const child = new Quad();
    child._parent = this;
    return child;
  }

  /** Unrotated corners of the ground storey. */
  private groundCorners(): Point[] {
    const corners = this.root.lowest.root._corners;
    if (corners === null) {
      throw new TreeIntegrityError("Ground storey root has no corners");
    }
    return corners.map((c): Point => [c[0], c[1]]);
  }

  private turn(step: number): boolean {
    const below = this.below;
    if (below !== null) return below.turn(step);
    this._rotation = ROTATIONS[mod4(this._rotation + step)]!;
    this.invalidateStack();
    return true;
  }

  /**
   * Detached copy of this quad's content: children, division, rotation and
   * attributes, without geometry. `baked` takes the rotation and division
   * this quad shows (which may come from the storey below) instead of its
   * own.
   */
  private duplicate(baked: boolean): Quad {
    const twin = new Quad();
    twin._rotation = baked ? this.rotation : this._rotation;
    const division = baked ? this.effectiveDivision() : this._division;
    twin._division = division === null ? null : [division[0], division[1]];
    twin._type = this._type;
    twin.style = this.style;
    twin.wallInner = this.wallInner;
    twin.wallOuter = this.wallOuter;

    const children = this._children;
    if (children !== null) {
      const left = children[0].duplicate(baked);
      const right = children[1].duplicate(baked);
      left._parent = twin;
      right._parent = twin;
      twin._children = [left, right];
    }
    return twin;
  }

  /** Moves `source`'s content into this quad; `source` is left a bare leaf. */
  private takeContent(source: Quad): void {
    const previous = this._children;
    if (previous !== null) {
      previous[0]._parent = null;
      previous[1]._parent = null;
    }

    const children = source._children;
    if (children !== null) {
      children[0]._parent = this;
      children[1]._parent = this;
    }
    this._children = children;
    source._children = null;

    this._division = source._division;
    this._rotation = source._rotation;
    this._type = source._type;
    this.style = source.style;
    this.wallInner = source.wallInner;
    this.wallOuter = source.wallOuter;
  }
}
