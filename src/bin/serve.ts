#!/usr/bin/env node
import { start } from '../bootstrap/server.js';

start().catch((error: unknown) => {
  console.error(`Error: ${error instanceof Error ? error.message : String(error)}`);
  process.exit(2);
});
