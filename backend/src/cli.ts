#!/usr/bin/env node
import dotenv from 'dotenv';
import { main } from './cli/main.js';

dotenv.config();

const controller = new AbortController();
process.once('SIGINT', () => {
  console.error('\nInterrupted, finishing up...');
  controller.abort();
});

main(process.argv.slice(2), {
  io: { out: line => console.log(line), err: line => console.error(line) },
  signal: controller.signal,
}).then(code => {
  process.exitCode = code;
}).catch((e: unknown) => {
  console.error(e);
  process.exitCode = 1;
});
