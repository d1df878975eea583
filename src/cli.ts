#!/usr/bin/env node
import { Command } from 'commander';
import { GswError } from './lib/errors.js';
import { outputError } from './lib/output.js';
import type { WatchOptions } from './commands/watch.js';

const program = new Command();

program
  .name('git-status-watch')
  .description('Reactive git status: prints one line per change for shell prompts and status bars')
  .version('0.1.0')
  .argument('[path]', 'Path inside the git repository (defaults to the current directory)')
  .option('--format <template>', "Custom format, e.g. '{branch} +{staged} ~{modified} ?{untracked}'")
  .option('--once', 'Print status once and exit')
  .option('--debounce-ms <ms>', 'Quiet period before a burst of changes triggers a refresh')
  .option('--drain-ms <ms>', "Time to wait and discard git's own writes before recomputing")
  .option('--always-print', 'Print on every change even if the status is unchanged')
  .option('--state-dir <dir>', 'Directory for the shared state and lock files')
  .option('--config <file>', 'Config file (YAML)')
  .option('--verbose', 'Report the elected role on stderr')
  .option('--json', 'Print errors as JSON')
  .action(async (dir: string | undefined, options: WatchOptions & { once?: boolean }) => {
    if (options.once) {
      const { onceCommand } = await import('./commands/once.js');
      await onceCommand(dir, options);
      return;
    }
    const { watchCommand } = await import('./commands/watch.js');
    await watchCommand(dir, options);
  });

// Error handling
program.exitOverride();

async function main() {
  try {
    await program.parseAsync(process.argv);
  } catch (err) {
    if (err instanceof GswError) {
      outputError(err, program.opts().json ?? false);
      process.exit(err.exitCode);
    }
    if (err instanceof Error && 'code' in err) {
      const code = err.code;
      if (code === 'commander.helpDisplayed' || code === 'commander.version') {
        process.exit(0);
      }
      if (typeof code === 'string' && code.startsWith('commander.')) {
        // commander already printed the usage error
        process.exit(1);
      }
    }
    outputError(err, false);
    process.exit(1);
  }
}

void main();
