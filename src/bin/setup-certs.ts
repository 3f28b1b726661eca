#!/usr/bin/env node
import { runSetupCerts } from '../bootstrap/setupCerts.js';

runSetupCerts(process.argv.slice(2))
  .then((code) => {
    process.exitCode = code;
  })
  .catch((error: unknown) => {
    console.error('Fatal error:', error);
    process.exitCode = 2;
  });
