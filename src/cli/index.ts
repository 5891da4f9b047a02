#!/usr/bin/env node
/**
 * rulepath CLI - vstupní bod.
 */

import { run } from './cli.js';

run().catch((err: unknown) => {
  console.error('Fatal error:', err);
  process.exit(1);
});
