import "dotenv/config";
import ms from "ms";
import { z } from "zod";
import { MetadataFormat } from "@/enums/output.enum.js";
import type { OutputOptions } from "@/types/output.js";

const durationMs = z
  .string()
  .trim()
  .transform((value, ctx) => {
    if (value === "") return 0;
    if (/^\d+$/.test(value)) return Number(value);

    const parsed = ms(value);
    if (!Number.isFinite(parsed)) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: `Invalid duration "${value}"` });
      return z.NEVER;
    }
    return parsed;
  });

const flag = z
  .enum(["true", "false", "1", "0", ""])
  .transform((value) => value === "true" || value === "1");

const envSchema = z.object({
  HOST: z.string().default("0.0.0.0"),
  PORT: z.coerce.number().int().positive().default(3000),
  MONGODB_URI: z.string().default("mongodb://localhost:27017/detection-recorder"),
  MQTT_BROKER_URL: z.string().default("mqtt://localhost:1883"),
  MQTT_DETECTION_TOPIC: z.string().default("detection-recorder/detection"),

  OUTPUT: z.string().default(""),
  SEGMENT: durationMs.default("0"),
  SPLIT: flag.default("false"),
  WRAP: z.coerce.number().int().nonnegative().default(0),
  CIRCULAR: z.coerce.number().nonnegative().default(0),
  PAUSE: flag.default("false"),
  SAVE_PTS: z.string().default(""),
  METADATA: z.string().default(""),
  METADATA_FORMAT: z.nativeEnum(MetadataFormat).default(MetadataFormat.JSON),

  FRAMERATE: z.coerce.number().positive().default(30),
  PRE_DETECTION_SECS: z.coerce.number().nonnegative().default(0),
  DETECTION_RECORD_SECS: z.coerce.number().positive().default(10),
  DETECTION_RECORD_PATH: z.string().default("~"),

  WEBHOOK_URL: z.string().default(""),
  WEBHOOK_TIMEOUT: durationMs.default("5s"),

  FFMPEG_PATH: z.string().default(""),
  TRANSCODE_PRESET: z.string().default("medium"),
  TRANSCODE_CRF: z.coerce.number().int().min(0).max(51).default(23),
});

export type EnvConfig = z.infer<typeof envSchema>;

export function parseEnv(env: NodeJS.ProcessEnv): EnvConfig {
  const result = envSchema.safeParse(env);
  if (!result.success) {
    const issues = result.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`);
    throw new Error(`Invalid environment configuration:\n  ${issues.join("\n  ")}`);
  }
  return result.data;
}

export function toOutputOptions(config: EnvConfig): OutputOptions {
  return {
    output: config.OUTPUT,
    segmentMs: config.SEGMENT,
    split: config.SPLIT,
    wrap: config.WRAP,
    circularMb: config.CIRCULAR,
    pause: config.PAUSE,
    savePts: config.SAVE_PTS,
    metadata: config.METADATA,
    metadataFormat: config.METADATA_FORMAT,
    framerate: config.FRAMERATE,
    preDetectionSecs: config.PRE_DETECTION_SECS,
    detectionRecordSecs: config.DETECTION_RECORD_SECS,
    detectionRecordPath: config.DETECTION_RECORD_PATH,
  };
}

export const envConfig = parseEnv(process.env);
