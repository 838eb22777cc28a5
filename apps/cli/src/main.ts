#!/usr/bin/env tsx
import { runCli } from './cli.js';

process.exitCode = runCli(process.argv.slice(2), {
  env: process.env,
  cwd: process.env.INIT_CWD ?? process.cwd(),
  console
});
