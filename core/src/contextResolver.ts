import { readFile } from 'node:fs/promises';
import { join, posix } from 'node:path';
import { pathExists } from 'fs-extra/esm';
import { glob, type IgnoreLike } from 'glob';
import * as ignoreModule from 'ignore';
import { errorMessage, logger } from './logger.js';
import type { CodebaseSnapshot } from './types.js';

// CommonJS package: the factory is module.exports, seen from ESM as `default`.
const createIgnore = ignoreModule.default;

type IgnoreRules = ReturnType<typeof createIgnore>;

interface IgnoreScope {
  /** Posix path of the directory the rules apply under, '' for the root. */
  dir: string;
  rules: IgnoreRules;
}

// Within one file set, later files take precedence over earlier ones.
const ROOT_IGNORE_FILES = [join('.git', 'info', 'exclude'), '.gitignore', '.ignore'];
const NESTED_IGNORE_FILES = ['.gitignore', '.ignore'];

const utf8 = new TextDecoder('utf-8', { fatal: true, ignoreBOM: true });

/** The deepest scope with a matching rule, ignore or negation, decides. */
function isIgnored(scopes: IgnoreScope[], relativePath: string, isDirectory: boolean): boolean {
  for (let i = scopes.length - 1; i >= 0; i--) {
    const { dir, rules } = scopes[i];
    if (dir && !relativePath.startsWith(`${dir}/`)) continue;
    const local = dir ? relativePath.slice(dir.length + 1) : relativePath;
    if (local === '') continue;
    const result = rules.test(isDirectory ? `${local}/` : local);
    if (result.ignored) return true;
    if (result.unignored) return false;
  }
  return false;
}

function toGlobIgnore(scopes: IgnoreScope[]): IgnoreLike {
  return {
    ignored: (p) => isIgnored(scopes, p.relativePosix(), p.isDirectory()),
    childrenIgnored: (p) => isIgnored(scopes, p.relativePosix(), true)
  };
}

async function loadScope(root: string, dir: string, files: string[]): Promise<IgnoreScope | null> {
  let rules: IgnoreRules | null = null;
  for (const file of files) {
    const path = join(root, dir, file);
    if (!(await pathExists(path))) continue;
    try {
      const content = await readFile(path, 'utf8');
      rules = (rules ?? createIgnore()).add(content);
    } catch (error) {
      logger.warn(`Could not read ignore file ${path}: ${errorMessage(error)}`);
    }
  }
  return rules ? { dir, rules } : null;
}

/**
 * Root rules apply to the whole tree; nested .gitignore/.ignore files apply
 * below their own directory and are skipped when that directory is ignored.
 * Scopes come back shallowest first.
 */
async function loadIgnoreScopes(root: string): Promise<IgnoreScope[]> {
  const scopes: IgnoreScope[] = [];
  const rootScope = await loadScope(root, '', ROOT_IGNORE_FILES);
  if (rootScope) scopes.push(rootScope);

  const found = await glob(`**/{${NESTED_IGNORE_FILES.join(',')}}`, {
    cwd: root,
    posix: true,
    ignore: toGlobIgnore(scopes)
  });
  const nestedDirs = [...new Set(found.map((file) => posix.dirname(file)))]
    .filter((dir) => dir !== '.')
    .sort((a, b) => a.split('/').length - b.split('/').length);

  for (const dir of nestedDirs) {
    if (isIgnored(scopes, dir, true)) continue;
    const scope = await loadScope(root, dir, NESTED_IGNORE_FILES);
    if (scope) scopes.push(scope);
  }

  return scopes;
}

export async function collectCodebase(root: string): Promise<CodebaseSnapshot> {
  const scopes = await loadIgnoreScopes(root);
  const files = await glob('**/*', { cwd: root, nodir: true, ignore: toGlobIgnore(scopes) });
  const entries: Array<[string, string]> = [];

  for (const file of files) {
    const path = join(root, file);
    try {
      entries.push([file, utf8.decode(await readFile(path))]);
    } catch (error) {
      logger.warn(`Could not read file ${path}: ${errorMessage(error)}`);
    }
  }

  if (entries.length === 0) {
    logger.warn('No readable files found in the codebase');
  }

  // fromEntries defines own keys, so a file named __proto__ is kept.
  return Object.freeze(Object.fromEntries(entries));
}
