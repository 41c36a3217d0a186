/**
 * Everything the CLI prints. Results go to stdout (human lines or one JSON
 * envelope); errors go to stderr, or to stdout as JSON under --json.
 */

import type { Command } from 'commander';
import type { AskOutcome, ErrorKind, LogLevel, RenderedArtifact } from '@ventasql/core';
import { CliError } from './errors.js';

export interface OutputOptions {
  json: boolean;
  quiet: boolean;
  verbose: boolean;
  debug: boolean;
}

/** Global flags; commander accepts them before or after the subcommand. */
export function addOutputFlags(program: Command): Command {
  return program
    .option('--json', 'Machine-readable JSON output', false)
    .option('--quiet', 'Print nothing on success', false)
    .option('--verbose', 'Show the executed SQL and log pipeline steps', false)
    .option('--debug', 'Log everything and show error details', false);
}

export function outputOptionsFromCommand(command: Command): OutputOptions {
  const opts = command.optsWithGlobals();
  return {
    json: Boolean(opts.json),
    quiet: Boolean(opts.quiet),
    verbose: Boolean(opts.verbose),
    debug: Boolean(opts.debug),
  };
}

/** --debug wins over --verbose; without either the configured level applies. */
export function logLevelFor(output: OutputOptions, configured: LogLevel): LogLevel {
  if (output.debug) return 'debug';
  if (output.verbose) return 'info';
  return configured;
}

function plural(count: number, word: string): string {
  return `${count} ${word}${count !== 1 ? 's' : ''}`;
}

export function describeArtifact(artifact: RenderedArtifact): string[] {
  switch (artifact.kind) {
    case 'table':
      return [
        artifact.text,
        '',
        artifact.shownRows < artifact.rowCount
          ? `Showing ${artifact.shownRows} of ${plural(artifact.rowCount, 'row')}.`
          : `${plural(artifact.rowCount, 'row')} returned.`,
      ];
    case 'chart':
      return [`Chart saved to ${artifact.path}`];
    case 'file':
      return [`Exported ${plural(artifact.rowCount, 'row')} to ${artifact.path}`];
    case 'empty':
      return ['No rows returned.'];
  }
}

/** One result: `{ok: true, data}` under --json, otherwise the human lines. */
export function printResult(data: unknown, lines: readonly string[], output: OutputOptions): void {
  if (output.json) {
    console.log(JSON.stringify({ ok: true, data }, null, 2));
    return;
  }
  if (output.quiet) return;
  for (const line of lines) {
    console.log(line);
  }
}

export function printAskSuccess(outcome: Extract<AskOutcome, { ok: true }>, output: OutputOptions): void {
  const lines = describeArtifact(outcome.artifact);
  if (output.verbose || output.debug) {
    lines.unshift(`SQL: ${outcome.sql}`, '');
  }
  printResult({ route: outcome.route, sql: outcome.sql, artifact: outcome.artifact }, lines, output);
}

export function printNotice(message: string, output: OutputOptions): void {
  if (!output.quiet && !output.json) {
    console.error(`Warning: ${message}`);
  }
}

const HINTS: Readonly<Record<ErrorKind, string | undefined>> = {
  translation_failed: 'Check OPENAI_API_KEY and network access, or raise VENTASQL_TRANSLATION_TIMEOUT_MS.',
  unsafe_query: 'Only single SELECT statements are run. Rephrase the question, or try the SQL with `ventasql check`.',
  execution_failed: undefined,
  not_plottable: 'Ask for a table instead, or for a total or count per category.',
  unknown: undefined,
};

export function errorPayload(error: unknown, debug: boolean): Record<string, unknown> {
  if (!(error instanceof CliError)) {
    const payload: Record<string, unknown> = {
      ok: false,
      code: 'INTERNAL_ERROR',
      message: error instanceof Error ? error.message : String(error),
    };
    if (debug) payload.details = error instanceof Error ? { stack: error.stack } : { raw: String(error) };
    return payload;
  }
  const payload: Record<string, unknown> = { ok: false, code: error.code, message: error.message };
  if (error.pipeline) payload.error = error.pipeline;
  if (debug) payload.details = error.details ?? null;
  return payload;
}

export function printError(error: unknown, output: OutputOptions): void {
  if (output.json) {
    console.log(JSON.stringify(errorPayload(error, output.debug), null, 2));
    return;
  }

  const message = error instanceof Error ? error.message : String(error);
  const kind = error instanceof CliError ? error.pipeline?.kind : undefined;
  console.error(kind ? `Error [${kind}]: ${message}` : `Error: ${message}`);

  const hint = kind ? HINTS[kind] : undefined;
  if (hint) console.error(`Hint: ${hint}`);

  if (output.debug) {
    if (error instanceof CliError && error.details !== undefined) {
      console.error('Details:', JSON.stringify(error.details, null, 2));
    } else if (error instanceof Error && error.stack) {
      console.error(error.stack);
    }
  }
}
