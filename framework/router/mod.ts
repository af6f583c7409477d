/**
 * Routing Layer
 *
 * Maps a method and an exact path to a composed middleware chain.
 */

export { Router, DEFAULT_REDIRECT_STATUS, type RouterOptions } from './router.ts';
export { DispatchTable, routeKey, ROUTE_KEY_SEPARATOR } from './table.ts';
