#!/usr/bin/env tsx

/**
 * ventasql CLI entrypoint.
 * Ask questions about the `ventas` table in plain Spanish and get a table,
 * a chart or a CSV export back.
 */

import dotenv from 'dotenv';
import { Command, CommanderError } from 'commander';
import { existsSync, readFileSync } from 'node:fs';
import { resolve } from 'node:path';
import { fileURLToPath } from 'node:url';
import {
  OpenAITranslationClient,
  QueryOrchestrator,
  ResultRenderer,
  SAFE_DEFAULTS,
  TranslationError,
  UnsafeQueryError,
  createDataStore,
  createLogger,
  createValidator,
  matchRoute,
  parseVentaRecords,
  seedDemoDatabase,
  testDbConnection,
  type VentaRecord,
} from '@ventasql/core';
import { EXIT_CODES, fromAskFailure, pipelineError, toExitCode, usageError } from './errors.js';
import {
  addOutputFlags,
  logLevelFor,
  outputOptionsFromCommand,
  printAskSuccess,
  printError,
  printNotice,
  printResult,
  type OutputOptions,
} from './output.js';
import { parseValidatorName, resolveConfig, type ConnectionFlags } from './settings.js';

dotenv.config();

const VERSION = '0.1.0';

const DEMO_FIXTURE = fileURLToPath(new URL('../fixtures/ventas-demo.json', import.meta.url));

// ── Helpers ──────────────────────────────────────────────────────────

async function runCommand(command: Command, fn: (output: OutputOptions) => Promise<void> | void): Promise<void> {
  const output = outputOptionsFromCommand(command);
  try {
    await fn(output);
  } catch (error: unknown) {
    printError(error, output);
    process.exitCode = toExitCode(error);
  }
}

function withExamples(cmd: Command, lines: string[]): Command {
  const rendered = lines.map((line) => `  ${line}`).join('\n');
  cmd.addHelpText('after', `\nExamples:\n${rendered}\n`);
  return cmd;
}

function withConnectionFlags(cmd: Command): Command {
  return cmd
    .option('--db <path>', 'SQLite database file (VENTASQL_DB_PATH)')
    .option('--db-type <type>', 'Database type: sqlite|postgres (VENTASQL_DB_TYPE)');
}

// ── Program ──────────────────────────────────────────────────────────

const program = new Command();

addOutputFlags(program.name('ventasql').description('Natural-language questions over sales data'))
  .showHelpAfterError('(run with --help for usage)')
  .helpOption('-h, --help', 'display help')
  .version(VERSION, '-v, --version', 'Show version number');

program.exitOverride();
program.addHelpText(
  'after',
  `
Command groups:
  Setup:  doctor, seed
  Query:  ask
  Debug:  check, route
`,
);

// ── ask ──────────────────────────────────────────────────────────────

type AskFlags = ConnectionFlags & { validator?: string };

withExamples(
  withConnectionFlags(
    program
      .command('ask')
      .description('Translate a question to SQL, run it and show a table, chart or CSV export')
      .argument('<question>', 'Question about the ventas table'),
  )
    .option('--output-dir <dir>', 'Directory for charts and exports (VENTASQL_OUTPUT_DIR)')
    .option('--validator <name>', 'SQL validator: denylist|ast', 'denylist')
    .option('--model <model>', 'OpenAI model (VENTASQL_MODEL)')
    .action(async function (this: Command, question: string) {
      await runCommand(this, async (output) => {
        const opts = this.opts<AskFlags>();
        const validatorName = parseValidatorName(opts.validator);
        const config = resolveConfig(opts);
        const logger = createLogger({
          level: logLevelFor(output, config.logLevel),
          format: output.json ? 'json' : 'text',
        });

        let translator: OpenAITranslationClient;
        try {
          translator = new OpenAITranslationClient({
            apiKey: config.openaiApiKey,
            model: config.model,
            timeoutMs: config.translationTimeoutMs,
          });
        } catch (err: unknown) {
          if (err instanceof TranslationError) throw usageError(err.message, 'CONFIG_INVALID');
          throw err;
        }

        const orchestrator = new QueryOrchestrator({
          translator,
          store: createDataStore(config.db, logger),
          renderer: new ResultRenderer({ outputDir: config.outputDir }),
          validator: createValidator(validatorName),
          logger,
          translationTimeoutMs: config.translationTimeoutMs,
        });

        const outcome = await orchestrator.handleQuestion(question);
        if (!outcome.ok) {
          throw fromAskFailure(outcome);
        }
        printAskSuccess(outcome, output);
      });
    }),
  [
    'ventasql ask "¿Cuántos productos se vendieron en enero?"',
    'ventasql ask "Genera un gráfico de ventas por mes"',
    'ventasql ask "Guarda las ventas por ciudad en un archivo csv" --output-dir out',
    'ventasql ask "total por vendedor" --validator ast --json',
  ],
);

// ── check ────────────────────────────────────────────────────────────

withExamples(
  program
    .command('check')
    .description('Run the SQL validator only and print the statement that would be executed')
    .argument('<sql>', 'Candidate SQL statement')
    .option('--validator <name>', 'SQL validator: denylist|ast', 'denylist')
    .action(async function (this: Command, sql: string) {
      await runCommand(this, (output) => {
        const validator = createValidator(parseValidatorName(this.opts<{ validator?: string }>().validator));
        try {
          const safe = validator.sanitize(sql);
          printResult({ sql: safe.sql, validatedBy: safe.validatedBy }, [safe.sql], output);
        } catch (err: unknown) {
          if (err instanceof UnsafeQueryError) {
            throw pipelineError({ kind: 'unsafe_query', message: err.message, reason: err.reason });
          }
          throw err;
        }
      });
    }),
  [
    'ventasql check "SELECT producto FROM ventas"',
    'ventasql check "SELECT 1; DROP TABLE ventas" --validator ast --json',
  ],
);

// ── route ────────────────────────────────────────────────────────────

withExamples(
  program
    .command('route')
    .description('Show which output a question would be routed to')
    .argument('<question>', 'Question text')
    .action(async function (this: Command, question: string) {
      await runCommand(this, (output) => {
        const match = matchRoute(question);
        printResult(
          match,
          [match.keyword === null ? match.route : `${match.route} (matched "${match.keyword}")`],
          output,
        );
      });
    }),
  ['ventasql route "Muestra el gráfico y guárdalo en excel"', 'ventasql route "ventas de marzo" --json'],
);

// ── seed ─────────────────────────────────────────────────────────────

type SeedFlags = ConnectionFlags & { from?: string };

withExamples(
  withConnectionFlags(
    program.command('seed').description('Create the demo ventas table in a SQLite database'),
  )
    .option('--from <file>', 'JSON array of sales records to load instead of the demo data')
    .action(async function (this: Command) {
      await runCommand(this, (output) => {
        const opts = this.opts<SeedFlags>();
        const config = resolveConfig(opts);
        if (config.db.type !== 'sqlite') {
          throw usageError('seed only writes SQLite databases. Use --db-type sqlite.');
        }

        const source = opts.from ? resolve(opts.from) : DEMO_FIXTURE;
        let records: VentaRecord[];
        try {
          records = parseVentaRecords(readFileSync(source, 'utf-8'));
        } catch (err: unknown) {
          throw usageError(err instanceof Error ? err.message : String(err), 'INVALID_ARGS', { source });
        }

        const count = seedDemoDatabase(config.db.path, records);
        printResult(
          { path: config.db.path, rows: count, source },
          [`Seeded ${count} row${count !== 1 ? 's' : ''} into ${config.db.path}`],
          output,
        );
      });
    }),
  ['ventasql seed', 'ventasql seed --db /tmp/ventas.sqlite', 'ventasql seed --from ./mis-ventas.json'],
);

// ── doctor ───────────────────────────────────────────────────────────

withExamples(
  withConnectionFlags(program.command('doctor').description('Check environment, configuration and database')).action(
    async function (this: Command) {
      await runCommand(this, async (output) => {
        const config = resolveConfig(this.opts<ConnectionFlags>());
        const nodeVersion = process.version;
        const nodeOk = parseInt(nodeVersion.slice(1), 10) >= 20;
        const db = await testDbConnection(config.db);
        const dbTarget =
          config.db.type === 'sqlite'
            ? config.db.path
            : `${config.db.user}@${config.db.host}:${config.db.port}/${config.db.database}`;

        const payload = {
          node: { version: nodeVersion, ok: nodeOk, requiredMajor: 20 },
          openAiKeySet: Boolean(config.openaiApiKey),
          model: config.model,
          db: { type: config.db.type, target: dbTarget, ...db },
          outputDir: { path: config.outputDir, exists: existsSync(config.outputDir) },
          safeDefaults: SAFE_DEFAULTS,
        };

        printResult(
          payload,
          [
            'ventasql doctor',
            '===============',
            '',
            `Node.js:    ${nodeVersion} ${nodeOk ? '✓' : '✗ (requires >=20)'}`,
            `OpenAI key: ${config.openaiApiKey ? 'set ✓' : 'not set'}`,
            `LLM model:  ${config.model}`,
            `Database:   ${config.db.type} ${dbTarget} ${db.ok ? `✓ (${db.serverVersion ?? 'ok'})` : '✗'}`,
            `Output dir: ${config.outputDir} ${payload.outputDir.exists ? '(exists)' : '(will be created)'}`,
            '',
            'Safe defaults:',
            `  Hard LIMIT:          ${SAFE_DEFAULTS.hardLimit}`,
            `  Table rows shown:    ${SAFE_DEFAULTS.tableDisplayRows}`,
            `  Statement timeout:   ${SAFE_DEFAULTS.statementTimeoutMs}ms`,
            `  Translation timeout: ${config.translationTimeoutMs}ms`,
          ],
          output,
        );
        if (!db.ok && db.error) {
          printNotice(db.error, output);
        }
      });
    },
  ),
  ['ventasql doctor', 'ventasql doctor --db-type postgres --json'],
);

// ── parse ────────────────────────────────────────────────────────────

async function main(): Promise<void> {
  try {
    await program.parseAsync(process.argv);
    if (process.exitCode === undefined) {
      process.exitCode = EXIT_CODES.success;
    }
  } catch (error: unknown) {
    const output = outputOptionsFromCommand(program);
    // Commander wraps usage/validation failures as CommanderError
    if (error instanceof CommanderError) {
      if (error.code === 'commander.helpDisplayed' || error.code === 'commander.version') {
        process.exitCode = EXIT_CODES.success;
        return;
      }
      printError(usageError(error.message), output);
      process.exitCode = EXIT_CODES.usage;
      return;
    }
    printError(error, output);
    process.exitCode = toExitCode(error);
  }
}

void main();
