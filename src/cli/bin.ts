#!/usr/bin/env node
import { main } from './index.js';

main(process.argv.slice(2)).catch((error: unknown) => {
  console.error('Fatal error:', error);
  process.exit(1);
});
