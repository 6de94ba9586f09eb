/**
 * =============================================================================
 * CORE CONSTANTS - Single Source of Truth
 * =============================================================================
 *
 * All application-wide constants in one place.
 * Import from '../core' in other modules.
 *
 * =============================================================================
 */

// =============================================================================
// SAMPLING DIRECTION
// =============================================================================

/**
 * Outcome of the direction decision for one invocation
 */
export enum Direction {
  HOME_TO_WORK = 'HOME_TO_WORK',
  WORK_TO_HOME = 'WORK_TO_HOME',
  SKIP = 'SKIP'
}

/**
 * Short codes accepted by the DIRECTION override and the report command
 */
export const DIRECTION_CODES = {
  H2W: Direction.HOME_TO_WORK,
  W2H: Direction.WORK_TO_HOME,
} as const;

export type DirectionCode = keyof typeof DIRECTION_CODES;

export type TravelDirection = Exclude<Direction, Direction.SKIP>;

/**
 * Wall-clock time of day; `second` defaults to 0
 */
export interface TimeOfDay {
  hour: number;
  minute: number;
  second?: number;
}

export interface DirectionWindow {
  direction: TravelDirection;
  start: TimeOfDay;
  end: TimeOfDay;
}

/**
 * Local-time sampling windows, both ends inclusive.
 * Same-day only; the 10:30-10:40 gap keeps the windows disjoint.
 */
export const DIRECTION_WINDOWS: readonly DirectionWindow[] = [
  {
    direction: Direction.HOME_TO_WORK,
    start: { hour: 5, minute: 30 },
    end: { hour: 10, minute: 30 },
  },
  {
    direction: Direction.WORK_TO_HOME,
    start: { hour: 10, minute: 40 },
    end: { hour: 18, minute: 30 },
  },
];

// =============================================================================
// GOOGLE MAPS PLATFORM
// =============================================================================

export const GOOGLE_MAPS = {
  GEOCODE_URL: 'https://maps.googleapis.com/maps/api/geocode/json',
  ROUTES_URL: 'https://routes.googleapis.com/directions/v2:computeRoutes',
  ROUTES_FIELD_MASK: 'routes.duration,routes.distanceMeters,routes.localizedValues,routes.description',
  GEOCODE_TIMEOUT_MS: 20_000,
  ROUTES_TIMEOUT_MS: 25_000,
} as const;

// =============================================================================
// DEFAULTS
// =============================================================================

export const DEFAULTS = {
  TIMEZONE: 'America/New_York',
  DB_PATH: 'commute.db',
  LOG_LEVEL: 'info',
  LOG_DIR: 'logs',
  REPORT_DAYS: 14,
  // Time-of-day filter the dashboard applies by default
  REPORT_WINDOW_START: { hour: 5, minute: 0 },
  REPORT_WINDOW_END: { hour: 19, minute: 0 },
} as const;

/**
 * SQLite CURRENT_TIMESTAMP layout, always UTC (luxon tokens)
 */
export const SQLITE_TIMESTAMP_FORMAT = 'yyyy-MM-dd HH:mm:ss';

// =============================================================================
// PROCESS EXIT CODES
// =============================================================================

export const EXIT_CODE = {
  OK: 0,
  FAILURE: 1,
  CONFIGURATION: 2,
} as const;

// =============================================================================
// ERROR CODES
// =============================================================================

/**
 * Application error codes
 * Format: CATEGORY_NUMBER
 */
export enum ErrorCode {
  // Configuration (1xxx)
  CONFIG_INVALID = 'CFG_1001',

  // Geocoding (2xxx)
  GEOCODE_REJECTED = 'GEO_2001',
  GEOCODE_NO_RESULTS = 'GEO_2002',
  GEOCODE_REQUEST_FAILED = 'GEO_2003',

  // Routing provider (3xxx)
  ROUTES_HTTP_ERROR = 'RTE_3001',
  ROUTES_EMPTY = 'RTE_3002',
  ROUTES_REQUEST_FAILED = 'RTE_3003',
  ROUTES_MALFORMED = 'RTE_3004',

  // Extraction (4xxx)
  PARSE_MISSING_FIELD = 'PRS_4001',
  PARSE_BAD_FORMAT = 'PRS_4002',

  // Storage (5xxx)
  STORAGE_WRITE_FAILED = 'STO_5001',
  STORAGE_READ_FAILED = 'STO_5002',

  // System (9xxx)
  INTERNAL_ERROR = 'SYS_9001',
}
