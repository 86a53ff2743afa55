/**
 * Centralized application constants for devicewatch
 * Timings are defaults; most of them can be overridden from config.json
 */

// ==================== FILE I/O ====================

export const FILE_IO = {
  /** Attempts for a single safe read or atomic write */
  MAX_ATTEMPTS: 3,
  /** Fixed delay between attempts (milliseconds) */
  RETRY_DELAY_MS: 100,
  /** Indentation used when persisting device documents */
  JSON_INDENT: 4,
} as const;

// ==================== STATE CACHE ====================

export const STATE_CACHE = {
  /** Lock file guarding the reload critical section */
  LOCK_FILE: '.reload.lock',
  /** Cross-process hint about the last completed reload */
  METADATA_FILE: '.cache_metadata.json',
  /** Background poll interval (milliseconds) */
  POLL_INTERVAL_MS: 5000,
  /** Trust a sibling's reload for this long (milliseconds) */
  GRACE_WINDOW_MS: 10_000,
  /** Cold-start wait for the local cache while a sibling loads */
  COLD_WAIT_MS: 5000,
  /** Sampling interval of the cold-start wait */
  COLD_WAIT_SAMPLE_MS: 500,
  /** Pause after a busy reload lock before falling back to the cache */
  LOCK_BUSY_WAIT_MS: 2000,
  /** A lock file older than this is treated as abandoned */
  LOCK_STALE_MS: 60_000,
  /** Bound on waiting for the refresh loop to exit */
  WORKER_STOP_TIMEOUT_MS: 5000,
} as const;

// ==================== ARTIFACTS ====================

export const ARTIFACTS = {
  /** Default look-back for a temperature chart (days) */
  DEFAULT_DAYS_TO_SHOW: 7,
  /** Readings further apart than this start a new line segment (hours) */
  SEGMENT_GAP_HOURS: 24,
  /** Padding above and below the temperature range (degrees) */
  Y_PADDING: 2,
  CHART_WIDTH: 1500,
  /** Chart height by number of charts configured for the device */
  CHART_HEIGHT: {
    SINGLE: 600,
    DOUBLE: 350,
    MANY: 250,
  },
  PALETTE: [
    '#1f77b4', '#ff7f0e', '#2ca02c', '#d62728', '#9467bd',
    '#8c564b', '#e377c2', '#7f7f7f', '#bcbd22', '#17becf',
  ],
} as const;

// ==================== HOUSEKEEPING ====================

export const HOUSEKEEPING = {
  /** Logfile trimming interval (milliseconds) */
  LOG_TRIM_INTERVAL_MS: 60 * 60 * 1000,
} as const;

// ==================== HTTP ====================

export const HTTP = {
  /** Largest accepted submission body after gzip inflation (bytes) */
  MAX_BODY_BYTES: 20 * 1024 * 1024,
  DEFAULT_HOST: '127.0.0.1',
  DEFAULT_PORT: 8000,
} as const;
