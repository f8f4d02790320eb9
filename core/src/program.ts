import { Command, InvalidArgumentError } from 'commander';
import chalk from 'chalk';
import { ConfigManager } from './config.js';
import { errorMessage, logger } from './logger.js';
import { DEFAULT_MAX_CONTEXT_FILES } from './prompt.js';
import { RESULTS_BANNER, ReviewService } from './reviewService.js';

interface ReviewCommandOptions {
  path: string;
  staged: boolean;
  maxFiles: number;
  model?: string;
  url?: string;
}

function parseCount(value: string): number {
  const count = Number(value);
  if (!Number.isInteger(count) || count < 0) {
    throw new InvalidArgumentError('Expected a non-negative integer.');
  }
  return count;
}

function fail(error: unknown): void {
  logger.error(errorMessage(error));
  process.exitCode = 1;
}

export function createProgram(cwd: string): Command {
  const configManager = new ConfigManager(cwd);
  const reviewService = new ReviewService(configManager, cwd);
  const program = new Command();

  program
    .name('ollama-review')
    .description('Review local git changes with a model served by Ollama')
    .option('--path <path>', 'Path to diff', '.')
    .option('--staged', 'Review staged changes only', false)
    .option('--max-files <count>', 'Codebase files to include as context', parseCount, DEFAULT_MAX_CONTEXT_FILES)
    .option('--model <name>', 'Model name, overrides config')
    .option('--url <url>', 'Ollama base URL, overrides config')
    .action(async (opts: ReviewCommandOptions) => {
      try {
        const review = await reviewService.review({
          path: opts.path,
          staged: opts.staged,
          maxFiles: opts.maxFiles,
          model: opts.model,
          ollamaUrl: opts.url
        });
        console.log(`\n${chalk.bold(RESULTS_BANNER)}`);
        console.log(review);
      } catch (error) {
        fail(error);
      }
    });

  program
    .command('config')
    .description('Print the effective settings')
    .action(async () => {
      try {
        const settings = await reviewService.resolveSettings();
        console.log(JSON.stringify({ ollama_url: settings.ollamaUrl, model: settings.model }, null, 2));
      } catch (error) {
        fail(error);
      }
    });

  return program;
}
