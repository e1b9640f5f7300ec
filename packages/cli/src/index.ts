#!/usr/bin/env node
// CLI entry point
// - `routespec compile` loads a route tree from a module and prints (or writes)
//   its OpenAPI 3.0 document.
// - `routespec validate` runs the wire conformance check over the same tree and
//   prints a Markdown or JSON report; it exits non-zero when any type fails.

import { Command, CommanderError } from 'commander';
import fs from 'node:fs';
import { writeFile } from 'node:fs/promises';
import path from 'node:path';
import { fileURLToPath } from 'node:url';
import {
  ErrorCode,
  ErrorPresenter,
  RouteSpecError,
  compileDetailed,
  getExitCode,
  isRouteSpecError,
  serializeDocument,
} from '@routespec/core';
import {
  renderJsonReport,
  renderMarkdownReport,
  runConformance,
} from '@routespec/reporter';
import { printEffectiveOptions, printRunDebug } from './debug.js';
import {
  type CompileCliOptions,
  type ValidateCliOptions,
  collectServer,
  parseBigIntMode,
  parseReportFormat,
  toCompileOptions,
  toValidateOptions,
} from './flags.js';
import { type ModuleLoader, importModule, loadRouteTree } from './loader.js';
import { renderCLIView } from './render.js';

export interface CliDeps {
  loadModule: ModuleLoader;
}

/** Exit status of one CLI invocation, set by actions that finish normally */
export interface CliRun {
  exitCode: number;
}

class InternalCliError extends RouteSpecError {}

function apiIdFor(file: string, exportName: string): string {
  const base = path.basename(file);
  return exportName === 'api' ? base : `${base}#${exportName}`;
}

export function createProgram(deps: CliDeps, run: CliRun): Command {
  const program = new Command();

  program
    .name('routespec')
    .description(
      'Compile route trees into OpenAPI 3.0 documents and check their wire encoders'
    )
    .version('0.1.0')
    .exitOverride();

  program
    .command('compile')
    .description('Print the OpenAPI document of a route tree')
    .requiredOption('-a, --api <module>', 'Module exporting the route tree')
    .option('-e, --export <name>', 'Export holding the route tree', 'api')
    .option('--title <title>', 'info.title of the document')
    .option('--api-version <version>', 'info.version of the document')
    .option('--server <url>', 'Server URL (repeatable)', collectServer, [])
    .option('-o, --out <file>', 'Write the document to a file instead of stdout')
    .option(
      '--bigint-json <mode>',
      'Bounds beyond the safe integer range: number|string|error',
      'number'
    )
    .option('--no-infer-errors', 'Do not add inferred 400/404 responses')
    .option('--debug', 'Print options, diagnostics and metrics to stderr')
    .action(async (options: CompileCliOptions) => {
      const bigintJSON = parseBigIntMode(options.bigintJson);
      const compileOptions = toCompileOptions(options);
      if (options.debug === true) {
        printEffectiveOptions('compile', { ...compileOptions, bigintJSON });
      }

      const tree = await loadRouteTree(
        options.api,
        options.export,
        deps.loadModule
      );
      const result = compileDetailed(tree, compileOptions);
      const text = `${serializeDocument(result.document, { bigintJSON })}\n`;

      if (options.out !== undefined) {
        await writeFile(path.resolve(process.cwd(), options.out), text, 'utf8');
      } else {
        process.stdout.write(text);
      }
      if (options.debug === true) {
        printRunDebug('compile', result.diagnostics, result.metrics);
      }
      run.exitCode = 0;
    });

  program
    .command('validate')
    .description('Check that every body type encodes to values its schema accepts')
    .requiredOption('-a, --api <module>', 'Module exporting the route tree')
    .option('-e, --export <name>', 'Export holding the route tree', 'api')
    .option('-n, --samples <number>', 'Samples per type', '100')
    .option('--seed <number>', 'Deterministic seed', '424242')
    .option('--no-formats', 'Skip `format` checks')
    .option('--format <format>', 'Report format: markdown|json', 'markdown')
    .option('--debug', 'Print options, diagnostics and metrics to stderr')
    .action(async (options: ValidateCliOptions) => {
      const format = parseReportFormat(options.format);
      const validateOptions = toValidateOptions(options);
      if (options.debug === true) {
        printEffectiveOptions('validate', validateOptions);
      }

      const tree = await loadRouteTree(
        options.api,
        options.export,
        deps.loadModule
      );
      const report = runConformance({
        tree,
        apiId: apiIdFor(options.api, options.export),
        options: validateOptions,
      });

      const rendered =
        format === 'json'
          ? renderJsonReport(report)
          : renderMarkdownReport(report);
      process.stdout.write(`${rendered}\n`);
      if (options.debug === true) {
        printRunDebug('validate', report.diagnostics, report.metrics);
      }

      const { failed, types } = report.summary;
      if (failed > 0) {
        process.stderr.write(
          `[routespec] ${failed} of ${types} types failed: ${report.summary.failedTypes.join(', ')}\n`
        );
        run.exitCode = getExitCode(ErrorCode.CONFORMANCE_VIOLATION);
      } else {
        run.exitCode = 0;
      }
    });

  return program;
}

/** Prints `err` and returns the exit status it maps to */
export function handleCliError(err: unknown): number {
  // Commander already printed usage, help or version
  if (err instanceof CommanderError) {
    return err.exitCode;
  }

  const env = process.env.NODE_ENV === 'production' ? 'prod' : 'dev';
  const presenter = new ErrorPresenter(env, {
    colors: process.stderr.isTTY === true,
  });

  let error: RouteSpecError;
  if (isRouteSpecError(err)) {
    error = err;
  } else {
    const message = err instanceof Error ? err.message : String(err);
    error = new InternalCliError({
      message: message || 'Unexpected error',
      errorCode: ErrorCode.INTERNAL_ERROR,
      cause: err instanceof Error ? err : undefined,
    });
  }

  const view = presenter.formatForCLI(error);
  console.error(renderCLIView(view));
  return error.getExitCode();
}

/** Runs the CLI over `argv` and resolves to the process exit status */
export async function main(
  argv: string[] = process.argv,
  deps: Partial<CliDeps> = {}
): Promise<number> {
  const run: CliRun = { exitCode: 0 };
  const program = createProgram(
    { loadModule: deps.loadModule ?? importModule },
    run
  );
  try {
    await program.parseAsync(argv);
    return run.exitCode;
  } catch (err: unknown) {
    return handleCliError(err);
  }
}

const entryFile =
  typeof process.argv[1] === 'string' ? fs.realpathSync(process.argv[1]) : '';
const moduleFile = fileURLToPath(import.meta.url);
const isDirectExecution = entryFile === moduleFile;

if (isDirectExecution) {
  process.exitCode = await main();
}
