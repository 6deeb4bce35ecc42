#!/usr/bin/env node
import { logger } from './observability/logger.js';
import { DEFINITION_USAGE, exitWithError, parseCliArgs, UsageError } from './cli.js';
import { loadResumeDefinition } from './resume/loader.js';
import { saveResume } from './export/file.js';

const log = logger.child({ module: 'main' });

async function main(): Promise<void> {
  const args = parseCliArgs(process.argv.slice(2));

  if (args.help) {
    process.stdout.write(`${DEFINITION_USAGE}\n`);
    return;
  }
  if (!args.definition) {
    throw new UsageError('Missing resume definition file');
  }

  const resume = loadResumeDefinition(args.definition);
  const { path } = await saveResume(resume, args.output);
  log.debug({ path }, 'Resume generated');
}

main().catch((err: unknown) => exitWithError(err, DEFINITION_USAGE));
