#!/usr/bin/env node
import { cli } from './cli.js';

cli.parseAsync(process.argv).catch((error: unknown) => {
  const errorMsg = error instanceof Error ? error.message : String(error);
  console.error(`❌ ${errorMsg}`);
  process.exit(1);
});
