/**
 * Intent routing: decides how a question's result is presented.
 *
 * The rules are an ordered table evaluated first-match-wins, so precedence
 * is data: a question mentioning both a chart and a file is a chart.
 */

export type RouteDecision = 'table' | 'chart' | 'file';

export interface RouteRule {
  route: Exclude<RouteDecision, 'table'>;
  keywords: readonly string[];
}

export interface RouteMatch {
  route: RouteDecision;
  /** Keyword that selected the route; null for the table fallback */
  keyword: string | null;
}

export const DEFAULT_ROUTE_TABLE: readonly RouteRule[] = Object.freeze([
  { route: 'chart', keywords: Object.freeze(['gráfico', 'grafico', 'gráficos', 'grafica']) },
  { route: 'file', keywords: Object.freeze(['archivo', 'csv', 'excel']) },
]);

function fold(text: string): string {
  return text.toLocaleLowerCase('es');
}

export function matchRoute(question: string, table: readonly RouteRule[] = DEFAULT_ROUTE_TABLE): RouteMatch {
  const text = fold(question);
  for (const rule of table) {
    const keyword = rule.keywords.find((kw) => text.includes(fold(kw)));
    if (keyword !== undefined) {
      return { route: rule.route, keyword };
    }
  }
  return { route: 'table', keyword: null };
}

export function routeQuestion(question: string, table: readonly RouteRule[] = DEFAULT_ROUTE_TABLE): RouteDecision {
  return matchRoute(question, table).route;
}
