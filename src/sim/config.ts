import type { PortalConfig } from "../shared/types.js";
import {
  MIN_SEGMENT_LENGTH, MAX_SEGMENT_LENGTH, PREFERRED_SEGMENT_LENGTH, PLACEMENT_SEED, UINT64_MASK,
} from "../shared/constants.js";

/**
 * Wall-segment portals ship disabled; hosts opt in with `featureEnabled`.
 */
export const DEFAULT_PORTAL_CONFIG: Readonly<PortalConfig> = Object.freeze({
  minSegmentLength: MIN_SEGMENT_LENGTH,
  maxSegmentLength: MAX_SEGMENT_LENGTH,
  preferredSegmentLength: PREFERRED_SEGMENT_LENGTH,
  featureEnabled: false,
  baseSeed: PLACEMENT_SEED,
});

/**
 * Why a config's segment bounds cannot be used, or null when they can.
 * Checked again at placement time since the context's config is mutable.
 */
export function segmentBoundsError(config: Readonly<PortalConfig>): string | null {
  for (const key of ["minSegmentLength", "maxSegmentLength", "preferredSegmentLength"] as const) {
    if (!Number.isInteger(config[key])) return `${key} must be an integer, got ${config[key]}`;
  }
  if (config.minSegmentLength < 1) {
    return `minSegmentLength must be at least 1, got ${config.minSegmentLength}`;
  }
  if (config.maxSegmentLength < config.minSegmentLength) {
    return `maxSegmentLength (${config.maxSegmentLength}) must not be below minSegmentLength (${config.minSegmentLength})`;
  }
  return null;
}

/**
 * Merge overrides onto the defaults and validate the result.
 * Throws RangeError on impossible segment bounds.
 */
export function createPortalConfig(overrides: Partial<PortalConfig> = {}): PortalConfig {
  const config: PortalConfig = { ...DEFAULT_PORTAL_CONFIG, ...overrides };

  const error = segmentBoundsError(config);
  if (error) throw new RangeError(error);

  config.baseSeed &= UINT64_MASK;
  return config;
}
