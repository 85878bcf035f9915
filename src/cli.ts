#!/usr/bin/env node
import { defaultIO, run } from './program.js';
import { consoleSink, writeUnexpected } from './output/writer.js';

run(process.argv.slice(2), defaultIO()).then(
  (code) => {
    process.exitCode = code;
  },
  (error: unknown) => {
    writeUnexpected(error, consoleSink);
    process.exitCode = 1;
  }
);
