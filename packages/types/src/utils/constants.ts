export const TOOLKIT_VERSION = '0.3.0';

/** Bank identity reported when nothing identifies the issuer. */
export const UNKNOWN_BANK = 'unknown';

/** Bank identity is printed near the start of a statement. */
export const DEFAULT_DETECTION_PAGE_BUDGET = 2;

/**
 * Documented fuzzy-match threshold. Identification accepts any positive
 * score unless a caller opts into this value as its minimum.
 */
export const FUZZY_SCORE_THRESHOLD = 80;
