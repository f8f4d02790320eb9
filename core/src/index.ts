export { ConfigManager, DEFAULT_SETTINGS, ENV_OVERRIDES, applyEnvOverrides } from './config.js';
export { collectCodebase } from './contextResolver.js';
export { diffArgs, getDiff } from './git.js';
export { isDebugEnabled, logger } from './logger.js';
export { generateUrl, parseGenerateResponse, runModel } from './modelRunner.js';
export { createProgram } from './program.js';
export {
  buildReviewPrompt,
  CONTEXT_HEADING,
  DEFAULT_MAX_CONTEXT_FILES,
  REVIEW_CHECKLIST,
  REVIEW_PREAMBLE,
  selectContextFiles
} from './prompt.js';
export { RESULTS_BANNER, ReviewService } from './reviewService.js';
export type {
  CodebaseSnapshot,
  DiffOptions,
  GenerateFragment,
  GenerateRequest,
  ReviewOptions,
  Settings
} from './types.js';
