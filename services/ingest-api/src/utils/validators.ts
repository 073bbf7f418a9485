import { z } from 'zod';
import { MAX_TIMESTAMP_MS, type JsonValue } from '../pipeline/types.js';

const JsonLiteral = z.union([z.string(), z.number(), z.boolean(), z.null()]);
export const JsonValueSchema: z.ZodType<JsonValue> = z.lazy(() =>
  z.union([JsonLiteral, z.array(JsonValueSchema), z.record(JsonValueSchema)])
);

export const IngestBody = z.object({
  app_id: z.string().min(1),
  ts: z
    .number()
    .int()
    .positive({ message: 'ts must be epoch ms > 0' })
    .max(MAX_TIMESTAMP_MS, { message: `ts must be epoch ms <= ${MAX_TIMESTAMP_MS}` }),
  payload: z.record(JsonValueSchema),
  device_id: z.string().min(1).optional(),
  msg_id: z.string().min(1).optional(),
  topic: z.string().min(1).optional(),
});
export type IngestBody = z.infer<typeof IngestBody>;

export const TelemetryQuery = z.object({
  device_id: z.string().min(1).optional(),
  device_type: z.string().min(1).optional(),
  limit: z.coerce.number().int().min(1).max(1000).default(100),
  offset: z.coerce.number().int().min(0).default(0),
});
export type TelemetryQuery = z.infer<typeof TelemetryQuery>;

export const HistoryQuery = z.object({
  hours: z.coerce.number().int().min(1).max(168).default(24),
});

export const DeleteQuery = z.object({
  days: z.coerce.number().int().min(1).max(365).default(30),
});
