#!/usr/bin/env node

import { runCli } from './cliCommands.js';

const code = runCli(process.argv.slice(2), {
  // eslint-disable-next-line no-console
  out: (line) => console.log(line),
  // eslint-disable-next-line no-console
  err: (line) => console.error(line),
  env: process.env,
});

process.exit(code);
