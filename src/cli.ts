#!/usr/bin/env node
/**
 * CLI entry point for corpus-crawler
 */
import { fileURLToPath } from 'url';
import { realpathSync, readFileSync } from 'fs';
import { dirname, join } from 'path';
import { DEFAULT_ASSETS_DIR } from './config/constants.js';
import { ConfigError } from './config/errors.js';
import { resolveAssetsDir } from './article/paths.js';
import { CorpusRegistry } from './corpus/corpus-registry.js';
import {
  DirectoryNotFoundError,
  EmptyDirectoryError,
  InconsistentDatasetError,
  NotADirectoryError,
} from './corpus/errors.js';
import { runCleaningPipeline } from './corpus/text-pipeline.js';
import { runScraper } from './pipeline/run.js';
import { WorkspaceError } from './storage/corpus-writer.js';

/** Read version from package.json */
function getVersion(): string {
  const srcDir = dirname(fileURLToPath(import.meta.url));
  const pkgPath = join(srcDir, '..', 'package.json');
  try {
    const pkg = JSON.parse(readFileSync(pkgPath, 'utf-8')) as { version?: string };
    return pkg.version ?? 'unknown';
  } catch (error) {
    console.debug('Failed to read version from package.json:', error);
    return 'unknown';
  }
}

export type Command = 'scrape' | 'clean';

const COMMANDS: readonly Command[] = ['scrape', 'clean'];

interface CliOptions {
  command: Command;
  configPath?: string;
  outputDir?: string;
}

type ParseResult =
  | { kind: 'ok'; opts: CliOptions; warnings: string[] }
  | { kind: 'help' }
  | { kind: 'version' }
  | { kind: 'error'; message: string };

function isCommand(value: string): value is Command {
  return (COMMANDS as readonly string[]).includes(value);
}

export function parseArgs(args: string[]): ParseResult {
  const warnings: string[] = [];
  const opts: CliOptions = { command: 'scrape' };
  let commandSeen = false;

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];

    switch (arg) {
      case '-c':
      case '--config':
        if (i + 1 >= args.length) return { kind: 'error', message: '--config requires a value' };
        opts.configPath = args[++i];
        break;
      case '-o':
      case '--out':
        if (i + 1 >= args.length) return { kind: 'error', message: '--out requires a value' };
        opts.outputDir = args[++i];
        break;
      case '-h':
      case '--help':
        return { kind: 'help' };
      case '-v':
      case '--version':
        return { kind: 'version' };
      default:
        if (arg.startsWith('-')) {
          warnings.push(`Unknown option: ${arg}`);
        } else if (!commandSeen && isCommand(arg)) {
          opts.command = arg;
          commandSeen = true;
        } else {
          return { kind: 'error', message: `Unexpected argument: ${arg}` };
        }
    }
  }

  return { kind: 'ok', opts, warnings };
}

function printUsage(): void {
  console.log(`Usage: corpus-crawler [command] [options]

Commands:
  scrape            Discover articles from the seed pages and save them (default)
  clean             Validate an existing corpus and write cleaned texts

Options:
  -c, --config <path>   Crawler configuration JSON (default: config/crawler.json,
                        or CRAWLER_CONFIG_PATH)
  -o, --out <dir>       Corpus directory (default: ${DEFAULT_ASSETS_DIR}, or ASSETS_PATH)
  -h, --help            Show this help
  -v, --version         Show version

Environment:
  LOG_LEVEL             trace | debug | info | warn | error | fatal (default: info)`);
}

function isPreflightError(error: unknown): error is Error {
  return (
    error instanceof ConfigError ||
    error instanceof WorkspaceError ||
    error instanceof DirectoryNotFoundError ||
    error instanceof NotADirectoryError ||
    error instanceof EmptyDirectoryError ||
    error instanceof InconsistentDatasetError
  );
}

async function runScrapeCommand(opts: CliOptions): Promise<void> {
  const controller = new AbortController();
  const onSigint = (): void => {
    console.error('\nInterrupted, finishing the current request...');
    controller.abort();
  };
  process.once('SIGINT', onSigint);

  try {
    const summary = await runScraper({
      configPath: opts.configPath,
      outputDir: resolveAssetsDir(opts.outputDir, DEFAULT_ASSETS_DIR),
      signal: controller.signal,
    });
    const placeholders = summary.placeholders > 0 ? `, ${summary.placeholders} placeholders` : '';
    console.error(
      `Scrape complete: ${summary.saved}/${summary.discovered} articles${placeholders}, ${summary.durationMs}ms -> ${summary.outputDir}`
    );
  } finally {
    process.removeListener('SIGINT', onSigint);
  }
}

async function runCleanCommand(opts: CliOptions): Promise<void> {
  const registry = await CorpusRegistry.open(resolveAssetsDir(opts.outputDir, DEFAULT_ASSETS_DIR));
  const written = await runCleaningPipeline(registry);
  console.error(`Cleaned ${written}/${registry.size} articles in ${registry.directory}`);
}

/** Run the CLI and return the process exit code. */
export async function main(argv: string[] = process.argv.slice(2)): Promise<number> {
  const result = parseArgs(argv);

  switch (result.kind) {
    case 'version':
      console.log(`corpus-crawler ${getVersion()}`);
      return 0;
    case 'help':
      printUsage();
      return 0;
    case 'error':
      console.error(`Error: ${result.message}`);
      printUsage();
      return 1;
  }

  const { opts, warnings } = result;
  for (const warning of warnings) {
    console.error(`Warning: ${warning}`);
  }

  try {
    if (opts.command === 'clean') {
      await runCleanCommand(opts);
    } else {
      await runScrapeCommand(opts);
    }
    return 0;
  } catch (error) {
    if (isPreflightError(error)) {
      console.error(`Error: ${error.message}`);
      return 1;
    }
    throw error;
  }
}

const isDirectRun =
  process.argv[1] && fileURLToPath(import.meta.url) === realpathSync(process.argv[1]);
if (isDirectRun) {
  main()
    .then((code) => {
      process.exit(code);
    })
    .catch((err) => {
      console.error(`Fatal: ${err}`);
      process.exit(1);
    });
}
