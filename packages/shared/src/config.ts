/**
 * Extraction Configuration
 *
 * All values can be tuned via environment variables. The numeric bounds are
 * guards against regex false positives, not business rules.
 */

export interface Bounds {
  min: number;
  max: number;
}

export interface LiveSettings {
  /** Number of incremental scrolls through the page */
  scrollSteps: number;
  /** Wait after each incremental scroll */
  stepWaitMs: number;
  /** Wait after returning to the top of the page */
  initialWaitMs: number;
  /** Scrolls to the very bottom (lazy FAQ sections) */
  bottomScrolls: number;
  bottomWaitMs: number;
  /** Final wait before the rendered DOM is read */
  settleWaitMs: number;
}

export interface ExtractionConfig {
  // Numeric guards
  navBounds: Bounds;
  croreBounds: Bounds;
  peBounds: Bounds;
  pbBounds: Bounds;
  ratingBounds: Bounds;

  // Free text
  freeTextMinLength: number;
  shortTextMaxLength: number;
  longTextMaxLength: number;

  // Lists
  faqLimit: number;
  holdingsLimit: number;
  holdingsRowsPerTable: number;

  // Section heuristics
  sectionTextCap: number;
  objectiveWindowChars: number;
  topSectionFraction: number;
  faqPositionalStart: number;

  // Live handle
  live: LiveSettings;
}

type Env = Record<string, string | undefined>;

function num(env: Env, name: string, fallback: number): number {
  const raw = env[name];
  if (raw === undefined || raw.trim() === '') return fallback;
  const parsed = Number(raw);
  return Number.isFinite(parsed) ? parsed : fallback;
}

function int(env: Env, name: string, fallback: number): number {
  const parsed = num(env, name, fallback);
  return Number.isInteger(parsed) && parsed >= 0 ? parsed : fallback;
}

/**
 * Build a configuration from environment variables, falling back to the
 * defaults for anything unset or unparseable.
 */
export function loadConfig(env: Env = process.env): ExtractionConfig {
  return {
    // Numeric guards
    navBounds: { min: num(env, 'NAV_MIN', 1), max: num(env, 'NAV_MAX', 10000) },
    croreBounds: { min: num(env, 'CRORE_MIN', 0.1), max: num(env, 'CRORE_MAX', 1000000) },
    peBounds: { min: num(env, 'PE_MIN', 5), max: num(env, 'PE_MAX', 100) },
    pbBounds: { min: num(env, 'PB_MIN', 0.1), max: num(env, 'PB_MAX', 20) },
    ratingBounds: { min: 1, max: 5 },

    // Free text
    freeTextMinLength: int(env, 'FREE_TEXT_MIN_LENGTH', 5),
    shortTextMaxLength: int(env, 'SHORT_TEXT_MAX_LENGTH', 200),
    longTextMaxLength: int(env, 'LONG_TEXT_MAX_LENGTH', 500),

    // Lists
    faqLimit: int(env, 'FAQ_LIMIT', 10),
    holdingsLimit: int(env, 'HOLDINGS_LIMIT', 5),
    holdingsRowsPerTable: int(env, 'HOLDINGS_ROWS_PER_TABLE', 10),

    // Section heuristics
    sectionTextCap: int(env, 'SECTION_TEXT_CAP', 200),
    objectiveWindowChars: int(env, 'OBJECTIVE_WINDOW', 2000),
    topSectionFraction: num(env, 'TOP_SECTION_FRACTION', 0.3),
    faqPositionalStart: num(env, 'FAQ_POSITIONAL_START', 0.7),

    // Live handle
    live: {
      scrollSteps: int(env, 'LIVE_SCROLL_STEPS', 5),
      stepWaitMs: int(env, 'LIVE_STEP_WAIT_MS', 800),
      initialWaitMs: int(env, 'LIVE_INITIAL_WAIT_MS', 500),
      bottomScrolls: int(env, 'LIVE_BOTTOM_SCROLLS', 3),
      bottomWaitMs: int(env, 'LIVE_BOTTOM_WAIT_MS', 1500),
      settleWaitMs: int(env, 'LIVE_SETTLE_WAIT_MS', 1500),
    },
  };
}

export const config: ExtractionConfig = loadConfig();
