#!/usr/bin/env node
import { program } from './cli/index.js';
import { exitWithError } from './cli/session.js';

program.parseAsync(process.argv).catch(exitWithError);
