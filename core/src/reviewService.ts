import { applyEnvOverrides, ConfigManager } from './config.js';
import { collectCodebase } from './contextResolver.js';
import { getDiff } from './git.js';
import { runModel } from './modelRunner.js';
import { buildReviewPrompt, DEFAULT_MAX_CONTEXT_FILES } from './prompt.js';
import type { ReviewOptions, Settings } from './types.js';

export const RESULTS_BANNER = 'Code Review Results:';

export class ReviewService {
  constructor(private readonly configManager: ConfigManager, private readonly repoRoot: string) {}

  /** Settings from the config files, then the environment, then `options`. */
  async resolveSettings(options: ReviewOptions = {}): Promise<Settings> {
    const settings = applyEnvOverrides(await this.configManager.load());
    return {
      ollamaUrl: options.ollamaUrl ?? settings.ollamaUrl,
      model: options.model ?? settings.model
    };
  }

  async review(options: ReviewOptions = {}): Promise<string> {
    const settings = await this.resolveSettings(options);
    const codebase = await collectCodebase(this.repoRoot);
    const diff = await getDiff({
      path: options.path ?? '.',
      staged: options.staged ?? false,
      cwd: this.repoRoot
    });

    const prompt = buildReviewPrompt(diff, codebase, options.maxFiles ?? DEFAULT_MAX_CONTEXT_FILES);
    return runModel(settings, prompt);
  }
}
