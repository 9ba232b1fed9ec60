#!/usr/bin/env node

// vfm entry point

import { runCli } from './cli.js';

process.on('uncaughtException', (error) => {
  console.error('[vfm] Uncaught exception:', error);
  process.exit(2);
});

process.on('unhandledRejection', (reason) => {
  console.error('[vfm] Unhandled rejection:', reason);
  process.exit(2);
});

runCli();
