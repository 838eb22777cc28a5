import { z } from 'zod';

export const referenceModeSchema = z.enum(['i', 's']);

export const caseStatusSchema = z.enum(['PASS', 'FAIL', 'ERROR']);

// Interpreter integers can exceed 2^53, so answers travel as decimal strings.
export const answerSchema = z.string().regex(/^-?\d+$/);

export const DEFAULT_ALL_PASSED_COUNT = 75;

// ─── Harness configuration ────────────────────────────────────────────────────

export const harnessEnvSchema = z.object({
  LAMA_PATH: z.string().min(1).optional(),
  LAMAC: z.string().min(1).optional(),
  RUNTIME_DIR: z.string().min(1).optional(),
  STD_LIB_DIR: z.string().min(1).optional(),
  LAMARIK: z.string().min(1).optional(),
  DUMP_DIR: z.string().min(1).optional(),
  FAIL_LOG: z.string().min(1).optional()
});

export const toolchainConfigSchema = z.object({
  workDir: z.string().min(1),
  lamac: z.string().min(1),
  runtimeDir: z.string().min(1),
  stdLibDir: z.string().min(1),
  lamarik: z.string().min(1),
  dumpDir: z.string().min(1),
  failLog: z.string().min(1)
});

export const cliOptionsSchema = z.object({
  reference: referenceModeSchema.optional(),
  out: z.string().min(1).optional(),
  allPassedCount: z.coerce.number().int().min(0).default(DEFAULT_ALL_PASSED_COUNT)
});

// ─── Test cases and results ───────────────────────────────────────────────────

export const testCaseSchema = z.object({
  name: z.string().min(1),
  source: z.string().min(1),
  input: z.string().min(1).optional(),
  answers: z.string().min(1).optional()
});

export const runResultSchema = z.object({
  exitCode: z.number().int(),
  seconds: z.number().min(0),
  output: z.string()
});

export const caseResultSchema = z.object({
  name: z.string().min(1),
  source: z.string().min(1),
  status: caseStatusSchema,
  targetSeconds: z.number().min(0),
  referenceSeconds: z.number().min(0).optional(),
  goldenAnswers: z.array(answerSchema).optional(),
  targetAnswers: z.array(answerSchema).optional(),
  error: z.string().optional()
});

export const runSummarySchema = z.object({
  total: z.number().int().min(0),
  passed: z.number().int().min(0),
  failed: z.number().int().min(0),
  targetSeconds: z.number().min(0),
  referenceSeconds: z.number().min(0)
});

export const runReportSchema = z.object({
  runId: z.string().min(1),
  startedAt: z.string().datetime(),
  finishedAt: z.string().datetime(),
  referenceMode: referenceModeSchema.optional(),
  summary: runSummarySchema,
  cases: z.array(caseResultSchema)
});

export type ReferenceMode = z.infer<typeof referenceModeSchema>;
export type CaseStatus = z.infer<typeof caseStatusSchema>;
export type HarnessEnv = z.infer<typeof harnessEnvSchema>;
export type ToolchainConfig = z.infer<typeof toolchainConfigSchema>;
export type CliOptions = z.infer<typeof cliOptionsSchema>;
export type TestCase = z.infer<typeof testCaseSchema>;
export type RunResult = z.infer<typeof runResultSchema>;
export type CaseResult = z.infer<typeof caseResultSchema>;
export type RunSummary = z.infer<typeof runSummarySchema>;
export type RunReport = z.infer<typeof runReportSchema>;
