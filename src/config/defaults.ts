/**
 * Default configuration for new sessions and the renderer boundary.
 */

export const DEFAULT_CONFIG = {
  /** Random turns used by SCRAMBLE when no length is given */
  scrambleLength: 10,
  /** Sticker edge as a fraction of its cubie (less than 1 leaves a visible gap) */
  stickerSize: 0.95,
} as const;

/** Share code payload version */
export const SHARE_CODE_VERSION = 1;
