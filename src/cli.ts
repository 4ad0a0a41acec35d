#!/usr/bin/env node
import { createRequire } from 'node:module';
import * as p from '@clack/prompts';
import { resolveCommand } from './cli/commands/resolve.js';
import { searchCommand } from './cli/commands/search.js';
import { riskCommand } from './cli/commands/risk.js';
import { trainCommand } from './cli/commands/train.js';
import { replCommand } from './cli/commands/repl.js';

async function printVersion(): Promise<void> {
  const require = createRequire(import.meta.url);
  const pkg: unknown = require('../package.json');
  const version =
    typeof pkg === 'object' && pkg !== null && 'version' in pkg && typeof pkg.version === 'string'
      ? pkg.version
      : 'unknown';

  console.log(`nlcmd     v${version}`);
  console.log(`Node.js   ${process.version}`);
  console.log(`Platform  ${process.platform} ${process.arch}`);
}

function showHelp(): void {
  console.log(`
nlcmd - Translate natural-language requests into shell commands

Usage:
  nlcmd <command> [options]

Commands:
  resolve, r "<request>"    Resolve a request to a command (JSON by default)
  search, s "<request>"     Show similar known requests and problem diagnoses
  risk "<command>"          Assess a shell command for risky patterns
  train                     Train the intent classifier and save the model
  repl                      Interactive resolve loop

Resolve Options:
  --os=windows|linux        Target OS family (default: config or host)
  --method=ml|fuzzy|rule    Restrict the cascade to one method family
  --pretty                  Human-readable output
  --execute                 Run the command after the risk gate and confirmation

Search Options:
  --threshold=N             Minimum similarity score 0-100 (default: 70)
  --limit=N                 Maximum results (default: 5)

Train Options:
  --out=<path>              Model file (default: config modelPath or nlcmd-model.json)
  --dataset=<path>          Training dataset (default: bundled data/commands.json)

Common Options:
  --config=<path>           Config file (default: nlcmd.config.json)
  --version, -V             Show version information
  --help, -h                Show this help message

Examples:
  nlcmd resolve "create a folder named proj" --os=linux
  nlcmd r "internet not working" --pretty
  nlcmd r "create a folder named proj and then create a file named notes.txt inside the folder"
  nlcmd r "delete file old.txt" --execute
  nlcmd search "lst all fils" --threshold=60
  nlcmd risk "rm -rf build"
  nlcmd train --out=models/nlcmd-model.json
`);
}

async function main(): Promise<void> {
  const args = process.argv.slice(2);
  const command = args[0];
  const rest = args.slice(1);

  if (command === '--version' || command === '-V') {
    await printVersion();
    return;
  }

  let exitCode: number;
  switch (command) {
    case 'resolve':
    case 'r':
      exitCode = await resolveCommand(rest);
      break;

    case 'search':
    case 's':
      exitCode = await searchCommand(rest);
      break;

    case 'risk':
      exitCode = await riskCommand(rest);
      break;

    case 'train':
      exitCode = await trainCommand(rest);
      break;

    case 'repl':
      exitCode = await replCommand(rest);
      break;

    case undefined:
    case 'help':
    case '--help':
    case '-h':
      showHelp();
      exitCode = 0;
      break;

    default:
      p.log.error(`Unknown command: ${command}`);
      showHelp();
      exitCode = 1;
  }

  if (exitCode !== 0) {
    process.exit(exitCode);
  }
}

main().catch((err: unknown) => {
  p.log.error(err instanceof Error ? err.message : String(err));
  process.exit(1);
});
