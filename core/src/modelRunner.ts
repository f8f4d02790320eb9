import { z } from 'zod';
import { errorMessage, logger } from './logger.js';
import type { GenerateFragment, GenerateRequest, Settings } from './types.js';

const fragmentSchema = z.object({
  response: z.string().default(''),
  done: z.boolean().default(false)
});

export function generateUrl(ollamaUrl: string): string {
  return `${ollamaUrl.replace(/\/+$/, '')}/api/generate`;
}

function parseFragment(line: string): GenerateFragment | null {
  let value: unknown;
  try {
    value = JSON.parse(line);
  } catch {
    return null;
  }
  const fragment = fragmentSchema.safeParse(value);
  return fragment.success ? fragment.data : null;
}

/**
 * Folds a line-delimited generate body into the review text. Lines that are
 * not fragments are skipped; the first `done` fragment ends the fold.
 */
export function parseGenerateResponse(body: string): string {
  let review = '';
  for (const line of body.split(/\r?\n/)) {
    const fragment = parseFragment(line);
    if (!fragment) continue;
    review += fragment.response;
    if (fragment.done) break;
  }
  return review;
}

// The endpoint answers line-delimited JSON even with `stream: false`, so the
// body always goes through parseGenerateResponse.
export async function runModel(settings: Settings, prompt: string): Promise<string> {
  const url = generateUrl(settings.ollamaUrl);
  const request: GenerateRequest = {
    model: settings.model,
    prompt,
    stream: false
  };

  let response: Response;
  try {
    response = await fetch(url, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: JSON.stringify(request)
    });
  } catch (error) {
    throw new Error(`Failed to reach inference endpoint ${url}: ${errorMessage(error)}`, {
      cause: error
    });
  }

  let body: string;
  try {
    body = await response.text();
  } catch (error) {
    throw new Error(`Failed to read inference response body: ${errorMessage(error)}`, {
      cause: error
    });
  }

  const status = [response.status, response.statusText].filter(Boolean).join(' ');
  logger.debug(`Response status: ${status}`);
  logger.debug(`Raw response: ${body}`);

  if (!response.ok) {
    logger.warn(`Inference endpoint responded with ${status}`);
  }

  return parseGenerateResponse(body);
}
