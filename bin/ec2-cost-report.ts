#!/usr/bin/env node
import 'dotenv/config';
import { run } from '../lib/cost-reporter/cli';

run(process.argv)
  .then((exitCode) => {
    process.exitCode = exitCode;
  })
  .catch((error) => {
    console.error('Unexpected failure:', error);
    process.exitCode = 1;
  });
