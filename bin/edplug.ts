#!/usr/bin/env node

import chalk from 'chalk';
import { createCLI } from '../src/cli/index.js';
import { describeError } from '../src/errors.js';

createCLI()
    .parseAsync(process.argv)
    .catch((err: unknown) => {
        console.error(chalk.red(`✗ ${describeError(err)}`));
        process.exit(1);
    });
