import { mkdirSync, mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { answerFileFor, discoverTestCases, inputFileFor } from '../src/discovery.js';
import { HarnessFatalError } from '../src/errors.js';

describe('discovery', () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'lama-discovery-'));
    mkdirSync(join(dir, 'nested'));
    writeFileSync(join(dir, 'test001.lama'), '');
    writeFileSync(join(dir, 'test001.input'), '1\n');
    writeFileSync(join(dir, 'test001.t'), '> 1\n');
    writeFileSync(join(dir, 'nested', 'test002.lama'), '');
    writeFileSync(join(dir, 'notes.txt'), '');
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it('finds sibling input and answer files', () => {
    const source = join(dir, 'test001.lama');
    expect(inputFileFor(source)).toBe(join(dir, 'test001.input'));
    expect(answerFileFor(source)).toBe(join(dir, 'test001.t'));
    expect(inputFileFor(join(dir, 'nested', 'test002.lama'))).toBeUndefined();
  });

  it('searches the working directory recursively when no path is given', () => {
    const cases = discoverTestCases([], dir);
    expect(cases).toEqual([
      {
        name: 'test002.lama',
        source: join(dir, 'nested', 'test002.lama'),
        input: undefined,
        answers: undefined
      },
      {
        name: 'test001.lama',
        source: join(dir, 'test001.lama'),
        input: join(dir, 'test001.input'),
        answers: join(dir, 'test001.t')
      }
    ]);
  });

  it('accepts explicit source files relative to the working directory', () => {
    const cases = discoverTestCases(['test001.lama'], dir);
    expect(cases.map((testCase) => testCase.source)).toEqual([join(dir, 'test001.lama')]);
  });

  it('expands directories given on the command line', () => {
    const cases = discoverTestCases(['nested'], dir);
    expect(cases.map((testCase) => testCase.name)).toEqual(['test002.lama']);
  });

  it('rejects other files', () => {
    const discover = () => discoverTestCases(['notes.txt'], dir);
    expect(discover).toThrow(HarnessFatalError);
    expect(discover).toThrow('Unsupported argument: notes.txt (must be .lama or a directory)');
  });

  it('fails when nothing is found', () => {
    const empty = join(dir, 'empty');
    mkdirSync(empty);
    expect(() => discoverTestCases([empty], dir)).toThrow('No .lama files found to test.');
  });
});
