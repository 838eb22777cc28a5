import { existsSync, readdirSync, statSync } from 'node:fs';
import { basename, extname, join, resolve } from 'node:path';
import type { TestCase } from '@lama-regression/schemas';
import { HarnessFatalError } from './errors.js';

export const SOURCE_EXTENSION = '.lama';
export const INPUT_EXTENSION = '.input';
export const ANSWERS_EXTENSION = '.t';

function isFile(path: string): boolean {
  return existsSync(path) && statSync(path).isFile();
}

function isDirectory(path: string): boolean {
  return existsSync(path) && statSync(path).isDirectory();
}

function sibling(source: string, extension: string): string | undefined {
  const candidate = source.slice(0, source.length - extname(source).length) + extension;
  return isFile(candidate) ? candidate : undefined;
}

export function inputFileFor(source: string): string | undefined {
  return sibling(source, INPUT_EXTENSION);
}

export function answerFileFor(source: string): string | undefined {
  return sibling(source, ANSWERS_EXTENSION);
}

function findSources(root: string): string[] {
  const entries = readdirSync(root, { recursive: true, encoding: 'utf8' });
  return entries
    .filter((entry) => entry.endsWith(SOURCE_EXTENSION))
    .map((entry) => join(root, entry))
    .filter(isFile)
    .sort();
}

export function toTestCase(source: string): TestCase {
  return {
    name: basename(source),
    source,
    input: inputFileFor(source),
    answers: answerFileFor(source)
  };
}

/**
 * Expands CLI paths into test cases. Directories are searched recursively;
 * without any path the working directory is searched.
 */
export function discoverTestCases(paths: string[], workDir: string): TestCase[] {
  const sources: string[] = [];

  if (paths.length === 0) {
    sources.push(...findSources(workDir));
  } else {
    for (const path of paths) {
      const absolute = resolve(workDir, path);
      if (isDirectory(absolute)) {
        sources.push(...findSources(absolute));
      } else if (extname(absolute) === SOURCE_EXTENSION) {
        sources.push(absolute);
      } else {
        throw new HarnessFatalError(`Unsupported argument: ${path} (must be .lama or a directory)`);
      }
    }
  }

  if (sources.length === 0) {
    throw new HarnessFatalError('No .lama files found to test.');
  }

  return sources.map(toTestCase);
}
