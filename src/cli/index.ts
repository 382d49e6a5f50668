#!/usr/bin/env node
import 'dotenv/config';
import { buildProgram } from './program.js';
import { getLogger } from '../utils/logging.js';

buildProgram()
  .parseAsync(process.argv)
  .catch((err: unknown) => {
    getLogger().error({ err }, 'tierbus command failed');
    process.exitCode = 1;
  });
