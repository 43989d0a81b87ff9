#!/usr/bin/env node
// Pokem - Matrix notification relay
// Main entry point

import { loadConfig } from './services/config';
import { HELP_TEXT, parseArgs, pokeOnce } from './cli';
import { runDaemon } from './daemon';

async function main(): Promise<void> {
  const args = parseArgs(process.argv.slice(2));
  if (args.help) {
    console.log(HELP_TEXT);
    return;
  }

  const config = loadConfig(args.config);

  if (args.daemon) {
    // Daemon mode ignores the room and message arguments
    console.log('[Pokem] Running in daemon mode');
    await runDaemon(config);
    return;
  }

  await pokeOnce(config, args);
}

main().catch((error: unknown) => {
  console.error('[Pokem] Fatal error:', error);
  process.exit(1);
});
