/**
 * Constants and default values for ranked hit lists
 *
 * @module hitlist-constants
 */

/**
 * Default and minimum slot capacity of a new hit list
 */
export const DEFAULT_HIT_CAPACITY = 256;

/**
 * Largest slot capacity a list may grow to unless configured otherwise
 */
export const DEFAULT_MAX_HIT_CAPACITY = 2 ** 28;

/**
 * Growth factor applied when an append finds the store full
 */
export const GROWTH_FACTOR = 2;

/**
 * Sentinel for "no best domain yet"
 */
export const NO_BEST_DOMAIN = -1;

/**
 * Default reporting thresholds (E-values)
 */
export const DEFAULT_TARGET_E = 10.0;
export const DEFAULT_DOMAIN_E = 10.0;

/**
 * Default prior probability of a biased-composition null model,
 * used to turn a domain's null2 correction into a bias score
 */
export const DEFAULT_NULL2_OMEGA = 1 / 256;

/**
 * Report column widths
 */
export const MIN_NAME_WIDTH = 8;
export const MIN_DESC_WIDTH = 32;
export const TARGET_ROW_FIXED_WIDTH = 59;
export const DOMAIN_HEADER_FIXED_WIDTH = 5;

export const NO_HITS_MESSAGE = '   [No hits detected that satisfy reporting thresholds]';

/**
 * Environment variables read by the configuration manager
 */
export const ENV_INITIAL_CAPACITY = 'RANKED_HITS_INITIAL_CAPACITY';
export const ENV_MAX_CAPACITY = 'RANKED_HITS_MAX_CAPACITY';
export const ENV_LOG_DIR = 'RANKED_HITS_LOG_DIR';
export const ENV_LOG_LEVEL = 'RANKED_HITS_LOG_LEVEL';
