import { z } from "zod";
import type { MetadataValue } from "@/types/output.js";

const metadataValue: z.ZodType<MetadataValue> = z.lazy(() =>
  z.union([z.string(), z.number(), z.boolean(), z.null(), z.array(metadataValue)]),
);

export const metadataRecordSchema = z.record(z.string(), metadataValue);

export const detectionSchema = z.object({
  sequence_id: z.number().int().nonnegative(),
  timestamp_us: z.number().int().optional(),
});

export const enabledSchema = z.object({
  enabled: z.boolean(),
});

export type DetectionPayload = z.infer<typeof detectionSchema>;
