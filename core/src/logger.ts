import chalk from 'chalk';

export function isDebugEnabled(env: NodeJS.ProcessEnv = process.env): boolean {
  return env.DEBUG === 'TRUE';
}

// Everything goes to stderr so stdout only ever carries the review.
export const logger = {
  warn: (message: string): void => {
    console.error(chalk.yellow(`Warning: ${message}`));
  },
  error: (message: string): void => {
    console.error(chalk.red(message));
  },
  debug: (message: string): void => {
    if (!isDebugEnabled()) return;
    console.error(chalk.gray(message));
  }
};

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
