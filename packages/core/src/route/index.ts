export { DEFAULT_ROUTE_TABLE, matchRoute, routeQuestion } from './router.js';
export type { RouteDecision, RouteMatch, RouteRule } from './router.js';
