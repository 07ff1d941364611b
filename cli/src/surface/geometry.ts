/**
 * Centered surface geometry.
 */

import type { ISurfaceConfig } from '../config/i-config.js';
import type { HostDimensions, SurfaceGeometry } from './i-surface.js';

/**
 * One-line surface shown while a request is in flight.
 */
export function loadingGeometry(
  dimensions: HostDimensions,
  config: ISurfaceConfig
): SurfaceGeometry {
  const width = Math.max(
    1,
    Math.floor(dimensions.columns * config.loadingWidthRatio)
  );
  const height = 1;
  return {
    width,
    height,
    row: Math.max(0, Math.floor((dimensions.lines - height) / 2)),
    col: Math.max(0, Math.floor((dimensions.columns - width) / 2)),
  };
}

/**
 * Large surface the response is rendered into. Sits one row above center.
 */
export function resultGeometry(
  dimensions: HostDimensions,
  config: ISurfaceConfig
): SurfaceGeometry {
  const width = Math.max(
    1,
    Math.floor(dimensions.columns * config.resultWidthRatio)
  );
  const height = Math.max(
    1,
    Math.floor(dimensions.lines * config.resultHeightRatio)
  );
  return {
    width,
    height,
    row: Math.max(0, Math.floor((dimensions.lines - height) / 2 - 1)),
    col: Math.max(0, Math.floor((dimensions.columns - width) / 2)),
  };
}
