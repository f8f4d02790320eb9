import type { CodebaseSnapshot } from './types.js';

export const DEFAULT_MAX_CONTEXT_FILES = 5;

export const REVIEW_PREAMBLE = 'As a code reviewer, analyze the following changes:';

export const CONTEXT_HEADING = 'Relevant files from the codebase for context:';

export const REVIEW_CHECKLIST = [
  'Please provide a detailed code review focusing on:',
  '1. Potential bugs or issues',
  '2. Code style and best practices',
  '3. Performance implications',
  '4. Security considerations',
  '5. Suggestions for improvement'
].join('\n');

/**
 * Takes the first `maxFiles` entries in the snapshot's own iteration order.
 * Which files that is depends on the walk, so it can differ between runs.
 */
export function selectContextFiles(
  codebase: CodebaseSnapshot,
  maxFiles: number
): Array<[string, string]> {
  const limit = Math.max(0, Math.floor(maxFiles));
  return Object.entries(codebase).slice(0, limit);
}

export function buildReviewPrompt(
  diff: string,
  codebase: CodebaseSnapshot,
  maxFiles: number = DEFAULT_MAX_CONTEXT_FILES
): string {
  let prompt = `${REVIEW_PREAMBLE}\n\n\`\`\`diff\n${diff}\n\`\`\`\n\n`;

  prompt += `${CONTEXT_HEADING}\n\n`;
  for (const [file, content] of selectContextFiles(codebase, maxFiles)) {
    prompt += `${file}:\n\`\`\`\n${content}\n\`\`\`\n\n`;
  }

  prompt += `\n${REVIEW_CHECKLIST}`;
  return prompt;
}
