import { describe, expect, it } from 'vitest';
import { buildReviewPrompt, REVIEW_CHECKLIST, selectContextFiles } from '../prompt.js';

describe('buildReviewPrompt', () => {
  it('should render the diff, context files and checklist in order', () => {
    const prompt = buildReviewPrompt('+const a = 2;', { 'src/a.ts': 'const a = 1;' }, 5);

    expect(prompt).toBe(
      'As a code reviewer, analyze the following changes:\n\n' +
        '```diff\n+const a = 2;\n```\n\n' +
        'Relevant files from the codebase for context:\n\n' +
        'src/a.ts:\n```\nconst a = 1;\n```\n\n' +
        '\nPlease provide a detailed code review focusing on:\n' +
        '1. Potential bugs or issues\n' +
        '2. Code style and best practices\n' +
        '3. Performance implications\n' +
        '4. Security considerations\n' +
        '5. Suggestions for improvement'
    );
  });

  it('should never include more than maxFiles file blocks', () => {
    const codebase = {
      'one.ts': 'one',
      'two.ts': 'two',
      'three.ts': 'three',
      'four.ts': 'four'
    };

    const prompt = buildReviewPrompt('diff', codebase, 2);

    expect(prompt.match(/^\w+\.ts:$/gm)).toEqual(['one.ts:', 'two.ts:']);
    expect(prompt).toContain(REVIEW_CHECKLIST);
  });

  it('should keep the heading and checklist with an empty diff and no files', () => {
    const prompt = buildReviewPrompt('', {}, 5);

    expect(prompt).toBe(
      'As a code reviewer, analyze the following changes:\n\n```diff\n\n```\n\n' +
        'Relevant files from the codebase for context:\n\n' +
        `\n${REVIEW_CHECKLIST}`
    );
  });

  it('should embed file content without truncation', () => {
    const large = 'x'.repeat(100_000);

    const prompt = buildReviewPrompt('diff', { 'big.txt': large }, 1);

    expect(prompt).toContain(`big.txt:\n\`\`\`\n${large}\n\`\`\``);
  });
});

describe('selectContextFiles', () => {
  it('should clamp negative and fractional limits', () => {
    const codebase = { 'a.ts': 'a', 'b.ts': 'b' };

    expect(selectContextFiles(codebase, -1)).toEqual([]);
    expect(selectContextFiles(codebase, 1.9)).toEqual([['a.ts', 'a']]);
  });
});
