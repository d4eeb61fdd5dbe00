// ── Grid ──

/** Number of columns in the simulation grid. */
export const GRID_WIDTH = 320;

/** Number of rows in the simulation grid. */
export const GRID_HEIGHT = 180;

/** Floats stored per cell: red, green, blue, alpha. */
export const CELL_STRIDE = 4;

/** Side length of the square tiles the step and seed passes walk the grid in. */
export const TILE_SIZE = 8;

// ── Simulation ──

/** Default simulation steps executed per second of wall-clock time. */
export const DEFAULT_STEPS_PER_SECOND = 30;

/** Upper bound on steps run in a single frame, so a slow frame can't snowball. */
export const MAX_STEPS_PER_FRAME = 8;

/** Speed choices offered in the controls, in steps per second. */
export const SPEED_OPTIONS = [1, 5, 10, 30, 60, 120];

// ── Hash ──

/** Initial xor applied by the seed hash (0xA3C59AC3). */
export const HASH_SEED_XOR = 2747636419;

/** Multiplier of the seed hash's avalanche rounds (0x9E3779B9). */
export const HASH_MULTIPLIER = 2654435769;

/** Largest 32-bit unsigned value; hash outputs are divided by it to land in [0, 1]. */
export const UINT32_MAX = 4294967295;

// ── Brush ──

/** Default brush radius in cells. */
export const DEFAULT_BRUSH_RADIUS = 10;

/** Largest brush radius offered in the controls. */
export const MAX_BRUSH_RADIUS = 300;

/** Default brush color as [r, g, b] in 0..1. */
export const DEFAULT_BRUSH_COLOR: readonly [number, number, number] = [1, 1, 1];

// ── Activations ──

/** Compiled activations kept per store; enough for three channels plus a preset list. */
export const ACTIVATION_CACHE_SIZE = 32;

// ── Rendering ──

/** Target rendering frame rate, used for rAF frame-rate capping. */
export const TARGET_FPS = 30;

/** Canvas background color outside the letterboxed grid. */
export const BACKGROUND_COLOR = 0x222222;

/** Step size of the filter coefficient inputs. */
export const FILTER_INPUT_STEP = 0.002;

// ── Persistence ──

/** Storage key for the per-channel filters and activations. */
export const SETTINGS_STORAGE_KEY = "nca-settings";

/** Storage key for the named filter and activation presets. */
export const PRESETS_STORAGE_KEY = "nca-presets";
