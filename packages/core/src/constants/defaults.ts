/**
 * Default configuration constants for Grovekit
 */

export const DEFAULT_CONFIG = {
  /** Arena layout */
  TREE: {
    /** Handle of the root node in every rooted tree */
    ROOT_HANDLE: 0,
    /** Level assigned to the root node */
    ROOT_LEVEL: 1,
  },

  /** Tree validation settings */
  VALIDATION: {
    MAX_DEPTH_WARNING: 64,
  },

  /** Outline rendering */
  RENDER: {
    INDENT: '  ',
  },
} as const;
