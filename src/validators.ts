/**
 * Zod schemas for MCP tool arguments.
 *
 * Clients may send `undefined` arguments for tools without required
 * fields, so every schema accepts a missing object.
 */

import { z } from 'zod';

export const CollectMetricsArgsSchema = z
  .object({
    dryRun: z.boolean().default(false),
  })
  .default({});

export const MetricHistoryArgsSchema = z.object({
  series: z.string().min(1, 'series is required'),
  limit: z.number().int().positive().max(1000).default(20),
});

export const LatestMetricsArgsSchema = z
  .object({
    runs: z.number().int().positive().max(100).default(5),
  })
  .default({});

/** Parse tool arguments, turning zod issues into a single readable message. */
export function parseToolArgs<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, args: unknown): T {
  const result = schema.safeParse(args);
  if (!result.success) {
    const detail = result.error.issues
      .map((issue) => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
      .join('; ');
    throw new Error(`Invalid arguments: ${detail}`);
  }
  return result.data;
}
