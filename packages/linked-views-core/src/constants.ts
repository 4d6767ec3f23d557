/**
 * Identifiers shared between decoupled participants of a link group.
 */

/**
 * Source id recorded on a snapshot produced by `LinkGroup.resetAll()`.
 * Widgets seeing it clear their local value rather than treating the change
 * as an ordinary filter update.
 */
export const GLOBAL_RESET_ID = 'LinkedViewsGlobalReset';
