import { describe, expect, it } from 'vitest';
import { loadToolchainConfig } from '../src/config.js';

describe('loadToolchainConfig', () => {
  it('derives tool paths from the sibling Lama checkout', () => {
    expect(loadToolchainConfig({}, '/work/lama-rs')).toEqual({
      workDir: '/work/lama-rs',
      lamac: '/work/Lama/src/lamac',
      runtimeDir: '/work/Lama/runtime',
      stdLibDir: '/work/Lama/stdlib/x64',
      lamarik: '/work/lama-rs/target/release/lama-rs',
      dumpDir: '/work/lama-rs/dump',
      failLog: '/work/lama-rs/failures.log'
    });
  });

  it('honours overrides from the environment', () => {
    const config = loadToolchainConfig(
      {
        LAMA_PATH: '/opt/Lama',
        LAMARIK: 'bin/lamarik',
        FAIL_LOG: '/tmp/fail.log',
        HOME: '/root'
      },
      '/work/lama-rs'
    );
    expect(config.lamac).toBe('/opt/Lama/src/lamac');
    expect(config.stdLibDir).toBe('/opt/Lama/stdlib/x64');
    expect(config.lamarik).toBe('/work/lama-rs/bin/lamarik');
    expect(config.failLog).toBe('/tmp/fail.log');
  });

  it('rejects empty overrides', () => {
    expect(() => loadToolchainConfig({ LAMAC: '' }, '/work/lama-rs')).toThrow();
  });
});
