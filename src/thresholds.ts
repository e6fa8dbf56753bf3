// Central threshold definitions for the survey coder.
//
// Split into two categories intentionally:
//
//   INTERNAL: calibrated against the weighted-ratio scorer in text-analyzer.ts.
//   Changing these without understanding the scorer produces confusing results.
//   Not exposed to users.
//
//   USER-FACING: control how the system behaves for the analyst's workflow.
//   Exposed via survey-coder-config.json under a top-level "behavior" key.

// ─── Internal algorithm thresholds ─────────────────────────────────────────

/** Below this length ratio (longer / shorter) partial scoring is skipped. */
export const PARTIAL_MIN_LENGTH_RATIO = 1.5;

/** Above this length ratio partial scores are scaled down harder. */
export const PARTIAL_LONG_LENGTH_RATIO = 8;

/** Scale applied to partial scores. */
export const PARTIAL_SCALE = 0.9;

/** Scale applied to partial scores when one string dwarfs the other. */
export const PARTIAL_SCALE_LONG = 0.6;

/** Scale applied to token-based scores so an exact ratio always wins ties. */
export const TOKEN_SCALE = 0.95;

// ─── User-facing behavior defaults ─────────────────────────────────────────

/** Minimum match score shown. 60 gives decent results on typical survey text. */
export const DEFAULT_MATCH_THRESHOLD = 60;

/** Maximum aggregated match rows returned by coder_match. */
export const DEFAULT_MAX_MATCH_RESULTS = 50;

/** Multi mode keeps categorized values in Uncategorized unless told otherwise. */
export const DEFAULT_MULTI_MODE_CLEARS_UNCATEGORIZED = false;

/** Percentages exclude missing responses from the denominator unless told otherwise. */
export const DEFAULT_INCLUDE_MISSING_DATA = false;

/** Maximum responses listed per category in coder_category_responses. */
export const MAX_CATEGORY_RESPONSES_SHOWN = 200;
