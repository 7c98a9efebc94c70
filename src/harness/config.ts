import { z } from 'zod';

export const DEFAULT_TIMEOUT_MS = 15000;
/** Largest delay setTimeout honours; anything above fires after 1 ms. */
export const MAX_TIMEOUT_MS = 2_147_483_647;

export interface HarnessConfig {
  timeoutMs: number;
  /** Run the built `dist/index.js` with node instead of the sources through tsx. */
  useDist: boolean;
}

const HarnessEnvSchema = z.object({
  IMPROVER_TEST_TIMEOUT_MS: z.coerce
    .number()
    .int('IMPROVER_TEST_TIMEOUT_MS must be a whole number of milliseconds')
    .positive('IMPROVER_TEST_TIMEOUT_MS must be positive')
    .max(MAX_TIMEOUT_MS, `IMPROVER_TEST_TIMEOUT_MS must be at most ${MAX_TIMEOUT_MS}`)
    .default(DEFAULT_TIMEOUT_MS),
  IMPROVER_TEST_DIST: z.string().optional(),
});

export function resolveHarnessConfig(env: NodeJS.ProcessEnv = process.env): HarnessConfig {
  const result = HarnessEnvSchema.safeParse({
    IMPROVER_TEST_TIMEOUT_MS: env['IMPROVER_TEST_TIMEOUT_MS'] || undefined,
    IMPROVER_TEST_DIST: env['IMPROVER_TEST_DIST'],
  });

  if (!result.success) {
    const details = result.error.issues.map((issue) => issue.message).join('; ');
    throw new Error(`Invalid harness configuration: ${details}`);
  }

  return {
    timeoutMs: result.data.IMPROVER_TEST_TIMEOUT_MS,
    useDist: result.data.IMPROVER_TEST_DIST === '1',
  };
}
