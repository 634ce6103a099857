#!/usr/bin/env node
/**
 * actor-dispatch CLI -- prints the selectors method names resolve to.
 */

import { Command } from 'commander';
import chalk from 'chalk';
import { config } from '../config/index.js';
import { getErrorMessage } from '../infra/errors.js';
import { renderSelectors, resolveSelectors } from './hash.js';

const program = new Command();

program
    .name('actor-dispatch')
    .description('Method selector tooling for numerically dispatched actors.')
    .version(config.version);

program
    .command('hash')
    .description('Print the selector for each method name')
    .argument('<names...>', 'Method names to hash')
    .option('-i, --ident', 'Convert code identifiers to PascalCase before hashing', false)
    .option('--json', 'Print JSON instead of tab-separated lines', false)
    .action((names: string[], options: { ident: boolean; json: boolean }) => {
        try {
            console.log(renderSelectors(resolveSelectors(names, options), options));
        } catch (err) {
            console.error(`  ${chalk.red('Cannot compute selector:')}`, getErrorMessage(err));
            process.exit(1);
        }
    });

program.parse();
