import { z } from 'zod';
import type { MetricsGroupBy } from '../infrastructure/db/index.js';

export const METRICS_GROUP_BY = ['path', 'method', 'host'] as const satisfies readonly MetricsGroupBy[];

/**
 * Query string of GET /api/v1/requests/metrics.
 *
 * Values arrive as strings; `window_seconds` is coerced and bounded to
 * [10, 3600]. `method` is compared upper-cased, matching how records store it.
 */
export const metricsQuerySchema = z.object({
  window_seconds: z.coerce
    .number({ invalid_type_error: 'window_seconds must be an integer' })
    .int('window_seconds must be an integer')
    .min(10, 'window_seconds must be between 10 and 3600')
    .max(3600, 'window_seconds must be between 10 and 3600')
    .default(60),
  group_by: z
    .enum(METRICS_GROUP_BY, {
      errorMap: () => ({ message: `group_by must be one of: ${METRICS_GROUP_BY.join(', ')}` }),
    })
    .default('path'),
  method: z.string().trim().min(1).transform((value) => value.toUpperCase()).optional(),
  host: z.string().trim().min(1).optional(),
});

export type MetricsQuery = z.output<typeof metricsQuerySchema>;
