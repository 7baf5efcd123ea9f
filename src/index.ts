#!/usr/bin/env node

import { createProgram } from './cli.js';

void createProgram()
  .parseAsync(process.argv)
  .catch((error: unknown) => {
    console.error('Error:', error instanceof Error ? error.message : error);
    process.exit(1);
  });
