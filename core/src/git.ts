import { spawn } from 'node:child_process';
import { logger } from './logger.js';
import type { DiffOptions } from './types.js';

export function diffArgs(options: DiffOptions): string[] {
  const args = ['diff'];
  if (options.staged) {
    args.push('--staged');
  }
  args.push(options.path);
  return args;
}

/**
 * Returns the raw `git diff` output for a path. The exit code is not
 * inspected: whatever git printed on stdout is the diff, empty when nothing
 * changed.
 */
export async function getDiff(options: DiffOptions): Promise<string> {
  const args = diffArgs(options);

  const stdout = await new Promise<Buffer>((resolve, reject) => {
    const child = spawn('git', args, {
      cwd: options.cwd,
      stdio: ['ignore', 'pipe', 'pipe']
    });

    const chunks: Buffer[] = [];
    let stderr = '';

    child.stdout.on('data', (chunk: Buffer) => {
      chunks.push(chunk);
    });

    child.stderr.on('data', (chunk: Buffer) => {
      stderr += chunk.toString();
    });

    child.on('error', (error) => {
      reject(new Error(`Failed to launch git: ${error.message}`, { cause: error }));
    });

    child.on('close', (code) => {
      if (code !== 0 && stderr) {
        logger.debug(`git ${args.join(' ')} exited with code ${code}: ${stderr.trim()}`);
      }
      resolve(Buffer.concat(chunks));
    });
  });

  try {
    return new TextDecoder('utf-8', { fatal: true }).decode(stdout);
  } catch (error) {
    throw new Error('git diff output is not valid UTF-8', { cause: error });
  }
}
