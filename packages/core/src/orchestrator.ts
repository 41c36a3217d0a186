/**
 * Question pipeline: translate → sanitize → execute → route → render.
 *
 * handleQuestion() never rejects. Every failure becomes one classified
 * ErrorResult, and an unsafe statement never reaches the store.
 */

import type { Logger } from 'winston';
import { SAFE_DEFAULTS } from './db/defaults.js';
import type { DataStore, ResultSet } from './db/types.js';
import { ExecutionError, TranslationError, errorMessage, toErrorResult, type ErrorResult } from './errors.js';
import { withTimeout } from './llm/timeout.js';
import type { TranslationClient } from './llm/types.js';
import type { ResultRenderer } from './render/renderer.js';
import type { RenderedArtifact } from './render/types.js';
import { matchRoute, type RouteDecision, type RouteRule, DEFAULT_ROUTE_TABLE } from './route/router.js';
import { DenylistValidator } from './sanitize/denylist.js';
import type { QueryValidator, SafeQuery } from './sanitize/types.js';
import { silentLogger } from './util/logger.js';

export interface QueryOrchestratorDeps {
  translator: TranslationClient;
  store: DataStore;
  renderer: ResultRenderer;
  /** Default: DenylistValidator */
  validator?: QueryValidator;
  logger?: Logger;
  /** Upper bound for the translation step. Default: 30s */
  translationTimeoutMs?: number;
  routeTable?: readonly RouteRule[];
}

export type AskOutcome =
  | { ok: true; artifact: RenderedArtifact; route: RouteDecision; sql: string }
  | { ok: false; error: ErrorResult; route?: RouteDecision; sql?: string };

export class QueryOrchestrator {
  private readonly translator: TranslationClient;
  private readonly store: DataStore;
  private readonly renderer: ResultRenderer;
  private readonly validator: QueryValidator;
  private readonly logger: Logger;
  private readonly routeTable: readonly RouteRule[];

  constructor(deps: QueryOrchestratorDeps) {
    this.translator = withTimeout(deps.translator, deps.translationTimeoutMs ?? SAFE_DEFAULTS.translationTimeoutMs);
    this.store = deps.store;
    this.renderer = deps.renderer;
    this.validator = deps.validator ?? new DenylistValidator();
    this.logger = deps.logger ?? silentLogger();
    this.routeTable = deps.routeTable ?? DEFAULT_ROUTE_TABLE;
  }

  async handleQuestion(question: string): Promise<AskOutcome> {
    let safe: SafeQuery | undefined;
    let route: RouteDecision | undefined;

    try {
      this.logger.debug('question received', { question });

      const candidate = await this.translate(question);
      this.logger.debug('candidate SQL', { sql: candidate });

      safe = this.validator.sanitize(candidate);
      this.logger.debug('sanitized SQL', { sql: safe.sql, validator: safe.validatedBy });

      const result = await this.execute(safe);
      this.logger.info('query executed', { rows: result.rows.length, columns: result.columns.length });

      const match = matchRoute(question, this.routeTable);
      route = match.route;
      this.logger.debug('route selected', { route: match.route, keyword: match.keyword });

      const artifact = await this.renderer.render(route, result);
      this.logger.info('artifact rendered', { kind: artifact.kind });

      return { ok: true, artifact, route, sql: safe.sql };
    } catch (err: unknown) {
      const error = toErrorResult(err);
      this.logger.warn('question failed', { kind: error.kind, message: error.message });
      return { ok: false, error, route, sql: safe?.sql };
    }
  }

  private async translate(question: string): Promise<string> {
    try {
      return await this.translator.translate(question);
    } catch (err: unknown) {
      if (err instanceof TranslationError) throw err;
      throw new TranslationError(`Translation failed: ${errorMessage(err)}`, { cause: err });
    }
  }

  private async execute(query: SafeQuery): Promise<ResultSet> {
    try {
      return await this.store.execute(query);
    } catch (err: unknown) {
      throw new ExecutionError(`Query execution failed: ${errorMessage(err)}`, { cause: err });
    }
  }
}
