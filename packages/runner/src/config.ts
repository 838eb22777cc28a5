import { resolve } from 'node:path';
import { harnessEnvSchema, toolchainConfigSchema, type ToolchainConfig } from '@lama-regression/schemas';

/**
 * Resolves tool locations the same way the Lama Makefile does. Every value
 * can be overridden through the environment; relative paths are taken from
 * `workDir`.
 */
export function loadToolchainConfig(
  env: Record<string, string | undefined>,
  workDir: string
): ToolchainConfig {
  const vars = harnessEnvSchema.parse(env);
  const lamaPath = resolve(workDir, vars.LAMA_PATH ?? '../Lama');

  return toolchainConfigSchema.parse({
    workDir,
    lamac: resolve(workDir, vars.LAMAC ?? resolve(lamaPath, 'src', 'lamac')),
    runtimeDir: resolve(workDir, vars.RUNTIME_DIR ?? resolve(lamaPath, 'runtime')),
    stdLibDir: resolve(workDir, vars.STD_LIB_DIR ?? resolve(lamaPath, 'stdlib', 'x64')),
    lamarik: resolve(workDir, vars.LAMARIK ?? './target/release/lama-rs'),
    dumpDir: resolve(workDir, vars.DUMP_DIR ?? './dump'),
    failLog: resolve(workDir, vars.FAIL_LOG ?? 'failures.log')
  });
}
