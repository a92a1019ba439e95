#!/usr/bin/env node
import 'dotenv/config';
import { runCli } from './cli.js';

runCli(process.argv.slice(2))
  .then((code) => {
    process.exitCode = code;
  })
  .catch((err) => {
    console.error('sheet-columns failed:', err);
    process.exitCode = 1;
  });
