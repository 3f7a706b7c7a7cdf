import ora, { type Ora } from 'ora';
import chalk from 'chalk';

/**
 * Spinner for long-running CLI steps (writes to stderr)
 */
export class Spinner {
    private spinner: Ora;

    constructor() {
        this.spinner = ora({ color: 'cyan', spinner: 'dots' });
    }

    start(message: string): void {
        this.spinner.start(chalk.dim(`  ${message}`));
    }

    success(message: string): void {
        this.spinner.succeed(chalk.green(`  ${message}`));
    }

    fail(message: string): void {
        this.spinner.fail(chalk.red(`  ${message}`));
    }
}
