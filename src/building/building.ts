import type {
  BoundaryId,
  BuildingConfig,
  WallEdge,
} from "../types/index.js";
import type { Boundary } from "../boundary/boundary.js";
import type { AdjacencyGraph } from "../graph/adjacency-graph.js";
import {
  DEFAULT_GRAPH_THRESHOLD,
  DEFAULT_STOREY_HEIGHT,
} from "../constants.js";
import { StoreyNotFoundError } from "../errors.js";
import { Quad } from "../quad/quad.js";
import { Logger } from "../utils/logger.js";
import { validateBuildingConfig } from "./building-config-validator.js";

/**
 * A stack of storeys on one footprint.
 *
 * Storey 0 is the ground storey; every storey above shares its corners,
 * rotation and, where both are divided, its division lines.
 */
export class Building {
  private readonly groundRoot: Quad;
  private readonly storeyHeight: number;
  private readonly graphThreshold: number;
  private readonly minimumWidth: number;

  /** @throws {InvalidBuildingConfigError} */
  constructor(config: BuildingConfig) {
    validateBuildingConfig(config);
    if (config.logLevel !== undefined) {
      Logger.setLevel(config.logLevel);
    }

    this.storeyHeight = config.storeyHeight ?? DEFAULT_STOREY_HEIGHT;
    this.graphThreshold = config.graphThreshold ?? DEFAULT_GRAPH_THRESHOLD;
    this.minimumWidth = config.minimumWidth ?? 0;
    this.groundRoot = Quad.create({
      corners: config.corners,
      elevation: config.elevation ?? 0,
      height: this.storeyHeight,
    });
  }

  // ============================================================
  // Storeys
  // ============================================================

  get ground(): Quad {
    return this.groundRoot;
  }

  get storeyCount(): number {
    return this.groundRoot.levelsAbove().length + 1;
  }

  /**
   * Root quad of storey `level` (0 = ground).
   * @throws {StoreyNotFoundError}
   */
  storey(level: number): Quad {
    const root =
      Number.isInteger(level) && level >= 0
        ? this.groundRoot.byRelativeLevel(level)
        : null;
    if (root === null) {
      throw new StoreyNotFoundError(
        `Storey ${level} not found (building has ${this.storeyCount})`,
      );
    }
    return root;
  }

  /** Adds a storey on top with the same layout as the current top storey. */
  addStorey(): Quad {
    const top = this.storey(this.storeyCount - 1);
    top.cloneAbove();
    Logger.info(`storey ${this.storeyCount - 1} added as a copy of ${top.level}`);
    return this.storey(this.storeyCount - 1);
  }

  /** Adds an undivided storey on top. */
  addEmptyStorey(): Quad {
    const top = this.storey(this.storeyCount - 1);
    top.addAbove();
    const added = this.storey(this.storeyCount - 1);
    added.height = this.storeyHeight;
    Logger.info(`empty storey ${added.level} added`);
    return added;
  }

  /** Removes the top storey. The ground storey cannot be removed. */
  removeTopStorey(): boolean {
    const count = this.storeyCount;
    if (count < 2) return false;
    this.storey(count - 2).delAbove();
    Logger.info(`storey ${count - 1} removed`);
    return true;
  }

  // ============================================================
  // Per-storey queries
  // ============================================================

  leafs(level: number): Quad[] {
    return this.storey(level).leafs();
  }

  boundaries(level: number): Map<BoundaryId, Boundary> {
    return this.storey(level).calcBoundaries();
  }

  /** Adjacency graph of storey `level`; `threshold` defaults to the configured one. */
  graph(level: number, threshold?: number): AdjacencyGraph<WallEdge> {
    return this.storey(level).graph(threshold ?? this.graphThreshold);
  }

  // ============================================================
  // Edits
  // ============================================================

  /**
   * Collapses every branch of storey `level` that has a child narrower than
   * the configured minimum width, deepest branches first. Each collapse is
   * recorded on the storey root's diagnostics.
   *
   * @returns the number of collapses
   */
  collapseNarrow(level: number): number {
    const root = this.storey(level);
    if (this.minimumWidth <= 0) return 0;

    let collapsed = 0;
    for (const branch of root.branches().reverse()) {
      // an earlier collapse may have cut this branch out of the tree
      if (branch.root !== root || !branch.divided) continue;
      const id = branch.id;
      if (branch.collapse(this.minimumWidth)) {
        collapsed++;
        root.fail(`collapsed "${id}" narrower than ${this.minimumWidth}`);
      }
    }

    if (collapsed > 0) {
      Logger.info(`storey ${level}: ${collapsed} narrow branches collapsed`);
    }
    return collapsed;
  }

  /** Straightens every division of every storey against outer edge `reference`. */
  straighten(reference = 0): boolean {
    return this.groundRoot.straightenRecursive(reference);
  }

  shift(x: number, y: number, z = 0): boolean {
    return this.groundRoot.shift(x, y, z);
  }
}
