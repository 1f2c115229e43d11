import type { BuildingConfig } from "../types/index.js";
import { InvalidBuildingConfigError } from "../errors.js";

function isNonNegative(value: number): boolean {
  return Number.isFinite(value) && value >= 0;
}

/**
 * Validates a building configuration.
 *
 * Rules enforced:
 * 1. Exactly four corners, all finite
 * 2. Elevation, when given, is finite
 * 3. Storey height, when given, is finite and positive
 * 4. Graph threshold and minimum width, when given, are finite and ≥ 0
 *
 * @throws {InvalidBuildingConfigError}
 */
export function validateBuildingConfig(config: BuildingConfig): void {
  // --- Rule 1: footprint ---
  if (config.corners.length !== 4) {
    throw new InvalidBuildingConfigError(
      `A building footprint needs exactly 4 corners, got ${config.corners.length}`,
    );
  }
  config.corners.forEach((corner, index) => {
    if (!Number.isFinite(corner[0]) || !Number.isFinite(corner[1])) {
      throw new InvalidBuildingConfigError(
        `Corner ${index} [${corner[0]}, ${corner[1]}] is not finite`,
      );
    }
  });

  // --- Rule 2: elevation ---
  if (config.elevation !== undefined && !Number.isFinite(config.elevation)) {
    throw new InvalidBuildingConfigError(
      `elevation must be finite, got ${config.elevation}`,
    );
  }

  // --- Rule 3: storey height ---
  if (
    config.storeyHeight !== undefined &&
    !(Number.isFinite(config.storeyHeight) && config.storeyHeight > 0)
  ) {
    throw new InvalidBuildingConfigError(
      `storeyHeight must be positive, got ${config.storeyHeight}`,
    );
  }

  // --- Rule 4: thresholds ---
  if (config.graphThreshold !== undefined && !isNonNegative(config.graphThreshold)) {
    throw new InvalidBuildingConfigError(
      `graphThreshold must be 0 or more, got ${config.graphThreshold}`,
    );
  }
  if (config.minimumWidth !== undefined && !isNonNegative(config.minimumWidth)) {
    throw new InvalidBuildingConfigError(
      `minimumWidth must be 0 or more, got ${config.minimumWidth}`,
    );
  }
}
