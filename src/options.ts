/**
 * Request validation and defaults for the batch API and the CLI.
 */

import { z } from 'zod';
import { InvalidOptionsError } from './errors.js';
import type { FailurePolicy, OutputPolicy, ResizeSpec } from './types.js';

export const MAX_RESIZE_VALUE = 10_000;

export const DEFAULT_RESIZE: ResizeSpec = { mode: 'Percent', value: 50 };

export const DEFAULT_POLICY: OutputPolicy = {
  format: 'jpg',
  quality: 85,
  stripGps: true,
  stripSerials: true,
  namePattern: 'img_{index}_{date}',
};

export const DEFAULT_FAILURE_POLICY: FailurePolicy = 'fail-fast';

export const resizeSpecSchema = z.object({
  mode: z.enum(['Percent', 'Width', 'Height']).default(DEFAULT_RESIZE.mode),
  value: z.coerce.number().int().min(1).max(MAX_RESIZE_VALUE).default(DEFAULT_RESIZE.value),
});

export const outputPolicySchema = z.object({
  format: z
    .string()
    .transform(s => s.trim().toLowerCase().replace(/^\./, ''))
    .transform(s => (s === 'jpeg' ? 'jpg' : s))
    .pipe(z.enum(['jpg', 'png', 'webp']))
    .default(DEFAULT_POLICY.format),
  quality: z.coerce.number().int().min(1).max(100).default(DEFAULT_POLICY.quality),
  stripGps: z.boolean().default(DEFAULT_POLICY.stripGps),
  stripSerials: z.boolean().default(DEFAULT_POLICY.stripSerials),
  namePattern: z.string().default(DEFAULT_POLICY.namePattern),
});

export const failurePolicySchema = z.enum(['fail-fast', 'isolate']).default(DEFAULT_FAILURE_POLICY);

export type ResizeSpecInput = z.input<typeof resizeSpecSchema>;
export type OutputPolicyInput = z.input<typeof outputPolicySchema>;

function issuesOf(error: z.ZodError, prefix: string): string[] {
  return error.issues.map(issue => {
    const path = [prefix, ...issue.path].join('.');
    return `${path}: ${issue.message}`;
  });
}

function parseWith<S extends z.ZodTypeAny>(schema: S, input: unknown, prefix: string): z.output<S> {
  const result = schema.safeParse(input);
  if (!result.success) {
    throw new InvalidOptionsError(issuesOf(result.error, prefix));
  }
  return result.data;
}

/**
 * Validate a resize spec, filling defaults. Throws InvalidOptionsError.
 */
export function resolveResizeSpec(input?: ResizeSpecInput): ResizeSpec {
  return parseWith(resizeSpecSchema, input ?? {}, 'resize');
}

/**
 * Validate an output policy, filling defaults and normalizing the format
 * (`jpeg`, `.JPG` → `jpg`). Throws InvalidOptionsError.
 */
export function resolveOutputPolicy(input?: OutputPolicyInput): OutputPolicy {
  return parseWith(outputPolicySchema, input ?? {}, 'policy');
}

export function resolveFailurePolicy(input?: string): FailurePolicy {
  return parseWith(failurePolicySchema, input, 'onError');
}
