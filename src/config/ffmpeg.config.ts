import { envConfig } from "@/config/index.js";

// Empty means "ffmpeg" from PATH
export const FFMPEG_PATH = envConfig.FFMPEG_PATH;

export const TRANSCODE_OUTPUT_EXTENSION = ".mp4";

export const TRANSCODE_OUTPUT_OPTIONS = [
  "-c:v libx264",
  `-preset ${envConfig.TRANSCODE_PRESET}`,
  `-crf ${envConfig.TRANSCODE_CRF}`,
  "-pix_fmt yuv420p",
  "-c:a copy",
];
