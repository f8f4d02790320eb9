import { readFile, stat } from 'node:fs/promises';
import { join } from 'node:path';
import { pathExists, readJSON } from 'fs-extra/esm';
import { parse as parseToml } from 'smol-toml';
import { z } from 'zod';
import { errorMessage, logger } from './logger.js';
import type { Settings } from './types.js';

export const DEFAULT_SETTINGS: Readonly<Settings> = Object.freeze({
  ollamaUrl: 'http://localhost:11434',
  model: 'codellama'
});

export const ENV_OVERRIDES = {
  URL: 'OLLAMA_REVIEW_URL',
  MODEL: 'OLLAMA_REVIEW_MODEL'
} as const;

type ConfigFormat = 'toml' | 'json';

// Later sources override keys from earlier ones.
const CONFIG_SOURCES: ReadonlyArray<{ file: string; format: ConfigFormat }> = [
  { file: 'config', format: 'toml' },
  { file: 'config.toml', format: 'toml' },
  { file: 'config.json', format: 'json' }
];

const configTableSchema = z.record(z.unknown());

const settingsFileSchema = z.object({
  ollama_url: z.string().default(DEFAULT_SETTINGS.ollamaUrl),
  model: z.string().default(DEFAULT_SETTINGS.model)
});

async function isFile(path: string): Promise<boolean> {
  if (!(await pathExists(path))) return false;
  return (await stat(path)).isFile();
}

async function readSource(path: string, format: ConfigFormat): Promise<Record<string, unknown>> {
  const raw: unknown =
    format === 'json' ? await readJSON(path) : parseToml(await readFile(path, 'utf8'));
  const table = configTableSchema.safeParse(raw);
  if (!table.success) {
    throw new Error('expected a table of settings');
  }
  return table.data;
}

export class ConfigManager {
  constructor(private readonly workspaceRoot: string) {}

  /**
   * Reads the optional settings files from the workspace root. A file that
   * cannot be parsed, or settings of the wrong type, yield the built-in
   * defaults as a whole.
   */
  async load(): Promise<Settings> {
    let merged: Record<string, unknown> = {};

    for (const source of CONFIG_SOURCES) {
      const path = join(this.workspaceRoot, source.file);
      if (!(await isFile(path))) continue;
      try {
        merged = { ...merged, ...(await readSource(path, source.format)) };
      } catch (error) {
        logger.warn(`Could not parse ${source.file}, using default settings: ${errorMessage(error)}`);
        return { ...DEFAULT_SETTINGS };
      }
    }

    const parsed = settingsFileSchema.safeParse(merged);
    if (!parsed.success) {
      const issues = parsed.error.issues
        .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
        .join('; ');
      logger.warn(`Invalid settings, using defaults: ${issues}`);
      return { ...DEFAULT_SETTINGS };
    }

    return { ollamaUrl: parsed.data.ollama_url, model: parsed.data.model };
  }
}

export function applyEnvOverrides(
  settings: Settings,
  env: NodeJS.ProcessEnv = process.env
): Settings {
  return {
    ollamaUrl: env[ENV_OVERRIDES.URL] || settings.ollamaUrl,
    model: env[ENV_OVERRIDES.MODEL] || settings.model
  };
}
