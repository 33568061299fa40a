/**
 * @loopwright/human-query
 *
 * Deadline-bound quick pick for asking a human, with an "Other" free-text
 * fallback and engagement detection.
 */

export { HumanQuery, InvalidQueryError, type HumanQueryDeps } from './human-query.js';
export { QuerySession, type QuerySessionOptions } from './query-session.js';
export { HUMAN_QUERY_CONFIG } from './config.js';
