import { parseArgs } from 'node:util';
import type { Resume } from './resume/document.js';
import { defaultOutputName, saveResume } from './export/file.js';
import { logger } from './observability/logger.js';

const log = logger.child({ module: 'cli' });

const OPTIONS_HELP = `Options:
  -o, --output <file>  Output HTML file name (default: "<name>_resume.html")
  -h, --help           Show this message`;

export const DEFINITION_USAGE = `Usage: resume-builder <definition.yml|definition.json> [options]\n\n${OPTIONS_HELP}`;

export const SCRIPT_USAGE = `Usage: <script> [options]\n\n${OPTIONS_HELP}`;

export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'UsageError';
  }
}

export interface CliArgs {
  output?: string;
  definition?: string;
  help: boolean;
}

export function parseCliArgs(argv: string[]): CliArgs {
  try {
    const { values, positionals } = parseArgs({
      args: argv,
      options: {
        output: { type: 'string', short: 'o' },
        help: { type: 'boolean', short: 'h', default: false },
      },
      allowPositionals: true,
      strict: true,
    });

    if (positionals.length > 1) {
      throw new UsageError(`Expected at most one definition file, got ${positionals.length}`);
    }

    return {
      output: values.output,
      definition: positionals[0],
      help: values.help ?? false,
    };
  } catch (err) {
    if (err instanceof UsageError) throw err;
    throw new UsageError(err instanceof Error ? err.message : String(err));
  }
}

/** Writes a resume defined in code. Returns the written path, or null when only help was asked for. */
export async function generateFromArgs(resume: Resume, argv: string[]): Promise<string | null> {
  const args = parseCliArgs(argv);
  if (args.help) {
    process.stdout.write(`${SCRIPT_USAGE}\n`);
    return null;
  }
  if (args.definition) {
    throw new UsageError(`Unexpected argument: ${args.definition}`);
  }

  const { path } = await saveResume(resume, args.output ?? defaultOutputName(resume));
  log.debug({ path }, 'Resume generated');
  return path;
}

export function exitWithError(err: unknown, usage: string): never {
  if (err instanceof UsageError) {
    process.stderr.write(`${err.message}\n\n${usage}\n`);
    process.exit(2);
  }
  log.fatal({ err }, 'Resume generation failed');
  process.exit(1);
}

/**
 * Entry point for resumes written in code: `cliMain(myResume)` at the bottom
 * of a script gives it the `-o/--output` option.
 */
export function cliMain(resume: Resume, argv: string[] = process.argv.slice(2)): void {
  generateFromArgs(resume, argv).catch((err: unknown) => exitWithError(err, SCRIPT_USAGE));
}
