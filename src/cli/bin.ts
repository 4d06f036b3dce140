#!/usr/bin/env node
import { describeError } from '../common/errors';
import { runCli } from './index';

runCli().then(
  (code) => {
    process.exitCode = code;
  },
  (error: unknown) => {
    process.stderr.write(`${describeError(error)}\n`);
    process.exitCode = 1;
  },
);
