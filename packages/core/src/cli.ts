#!/usr/bin/env node
/**
 * Tiermind CLI — Modular command router entry point.
 *
 * Usage:
 *   tiermind                         # Start with defaults
 *   tiermind start --port 18790      # Custom port
 *   tiermind config                  # Show resolved config
 *   tiermind memory stats alice      # Inspect a user's memory
 */

import { createRouter } from './cli/router.js';
import { startCommand } from './cli/commands/start.js';
import { configCommand } from './cli/commands/config.js';
import { memoryCommand } from './cli/commands/memory.js';

const router = createRouter('start');

router.register(startCommand);
router.register(configCommand);
router.register(memoryCommand);

router.register({
  name: 'help',
  description: 'Show available commands',
  usage: 'tiermind help',
  async run() {
    router.printHelp(process.stdout);
    return 0;
  },
});

const { command, rest } = router.resolve(process.argv);

command
  .run({ argv: rest, stdout: process.stdout, stderr: process.stderr })
  .then((code) => {
    if (code !== 0) process.exitCode = code;
  })
  .catch((err: unknown) => {
    console.error('Fatal error:', err);
    process.exit(1);
  });
