#!/usr/bin/env node

import { runCli } from './index';
import { defaultIO } from './io';

runCli({ argv: process.argv.slice(2), io: defaultIO() })
  .then((code) => {
    process.exitCode = code;
  })
  .catch((err: unknown) => {
    process.stderr.write(`${err instanceof Error ? err.stack ?? err.message : String(err)}\n`);
    process.exitCode = 1;
  });
