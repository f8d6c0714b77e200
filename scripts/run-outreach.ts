#!/usr/bin/env npx tsx
/**
 * Outreach drafting CLI.
 *
 * Runs the agent once for a single task prompt, or over a slice of
 * recipient files with a prompt template.
 *
 * Usage:
 *   npm run outreach "Draft an email to jo@example.com about the spring catalog"
 *   npm run outreach -- --dir recipients --begin 0 --end 5 --template templates/outreach-task.example.md
 */

import { readFile } from 'fs/promises';
import { validateConfig } from '../src/config.js';
import { createOutreachAgent } from '../src/orchestrator/index.js';
import { processRecipients } from '../src/domains/outreach/service/batch.js';
import { createLogger, initObservability } from '../src/utils/observability/index.js';
import { errorMessage } from '../src/utils/errors.js';

interface Options {
  dir: string | null;
  begin: number;
  end: number;
  template: string | null;
  task: string;
}

function parseIndex(flag: string, value: string | undefined): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 0) {
    console.error(`Error: ${flag} needs a non-negative integer, got "${value ?? ''}"`);
    process.exit(1);
  }
  return parsed;
}

function parseArgs(args: string[]): Options {
  const options: Options = {
    dir: null,
    begin: 0,
    end: 1,
    template: null,
    task: '',
  };

  const positional: string[] = [];

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];

    if (arg === '--dir' || arg === '-d') {
      options.dir = args[++i] ?? null;
    } else if (arg === '--begin' || arg === '-b') {
      options.begin = parseIndex('--begin', args[++i]);
    } else if (arg === '--end' || arg === '-e') {
      options.end = parseIndex('--end', args[++i]);
    } else if (arg === '--template' || arg === '-t') {
      options.template = args[++i] ?? null;
    } else if (arg === '--help' || arg === '-h') {
      printHelp();
      process.exit(0);
    } else if (!arg.startsWith('-')) {
      positional.push(arg);
    }
  }

  options.task = positional.join(' ');

  return options;
}

function printHelp(): void {
  console.log(`
Outreach Drafting CLI

Usage:
  npm run outreach "task prompt"
  npm run outreach -- --dir <recipients dir> --begin 0 --end 5 --template <file>

Options:
  --dir, -d         Directory of customer_<i>.json recipient files (batch mode)
  --begin, -b       First recipient index, inclusive (default: 0)
  --end, -e         Last recipient index, exclusive (default: 1)
  --template, -t    Prompt template containing {Insert JSON Here} (batch mode)
  --help, -h        Show this help message

Drafts are saved and labeled, never sent.
`);
}

async function main(options: Options): Promise<void> {
  validateConfig();
  initObservability();
  const logger = createLogger({ domain: 'outreach-cli' });

  if (options.dir) {
    if (!options.template) {
      console.error('Error: --template is required with --dir');
      process.exitCode = 1;
      return;
    }
    const template = await readFile(options.template, 'utf-8');
    const summary = await processRecipients({
      dir: options.dir,
      begin: options.begin,
      end: options.end,
      template,
      agentFactory: () => createOutreachAgent(logger),
      logger,
    });
    console.log(JSON.stringify(summary, null, 2));
    return;
  }

  if (!options.task) {
    console.error('Error: No task prompt provided');
    console.error('Usage: npm run outreach "task prompt"');
    process.exitCode = 1;
    return;
  }

  const result = await createOutreachAgent(logger).run(options.task);
  console.log(JSON.stringify(result, null, 2));
  if (result.error !== null) {
    process.exitCode = 1;
  }
}

// Parse arguments (skip node and script path)
const options = parseArgs(process.argv.slice(2));

main(options).catch((error: unknown) => {
  console.error('Error:', errorMessage(error));
  process.exitCode = 1;
});
