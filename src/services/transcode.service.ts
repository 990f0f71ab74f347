import { EventEmitter } from "node:events";
import fs from "node:fs/promises";
import Ffmpeg from "fluent-ffmpeg";
import {
  FFMPEG_PATH,
  TRANSCODE_OUTPUT_EXTENSION,
  TRANSCODE_OUTPUT_OPTIONS,
} from "@/config/ffmpeg.config.js";
import type { TranscodeHandoff, TranscodeResult } from "@/types/output.js";
import { replaceExtension } from "@/utils/recordingPath.util.js";

export type CommandFactory = (rawPath: string) => Ffmpeg.FfmpegCommand;

export interface TranscodeManagerOptions {
  commandFactory?: CommandFactory;
  outputOptions?: string[];
  removeFile?: (target: string) => Promise<void>;
}

const defaultCommandFactory: CommandFactory = (rawPath) => {
  const command = Ffmpeg({ priority: 0 }).input(rawPath);
  if (FFMPEG_PATH) command.setFfmpegPath(FFMPEG_PATH);
  return command;
};

export interface TranscodeManager {
  on(event: "done", listener: (result: TranscodeResult) => void): this;
  off(event: "done", listener: (result: TranscodeResult) => void): this;
  emit(event: "done", result: TranscodeResult): boolean;
}

/**
 * Converts finished raw recordings to MP4 in background ffmpeg processes.
 * The raw file is removed once the conversion succeeded and kept otherwise.
 */
export class TranscodeManager extends EventEmitter implements TranscodeHandoff {
  private activeCommands: Map<string, Ffmpeg.FfmpegCommand> = new Map();
  private startedCommands = new WeakSet<Ffmpeg.FfmpegCommand>();
  private cancelledCommands = new WeakSet<Ffmpeg.FfmpegCommand>();
  private readonly commandFactory: CommandFactory;
  private readonly outputOptions: string[];
  private readonly removeFile: (target: string) => Promise<void>;

  constructor(options: TranscodeManagerOptions = {}) {
    super();
    this.commandFactory = options.commandFactory ?? defaultCommandFactory;
    this.outputOptions = options.outputOptions ?? TRANSCODE_OUTPUT_OPTIONS;
    this.removeFile = options.removeFile ?? ((target) => fs.unlink(target));
  }

  get activeCount(): number {
    return this.activeCommands.size;
  }

  submit(rawPath: string): void {
    if (this.activeCommands.has(rawPath)) {
      return; // Already converting
    }

    const outputPath = replaceExtension(rawPath, TRANSCODE_OUTPUT_EXTENSION);

    const command = this.commandFactory(rawPath);
    command
      .outputOptions(this.outputOptions)
      .output(outputPath)
      .on("start", (cmd: string) => {
        if (this.cancelledCommands.has(command)) {
          console.log(`[Transcode] Conversion of ${rawPath} was cancelled before ffmpeg started, killing it`);
          command.kill("SIGKILL");
          return;
        }
        this.startedCommands.add(command);
        console.log(`[Transcode] Running ffmpeg in the background: ${cmd}`);
      })
      .on("end", () => {
        this.activeCommands.delete(rawPath);
        this.finishConverted(rawPath, outputPath);
      })
      .on("error", (err: Error) => {
        this.activeCommands.delete(rawPath);
        console.error(`[Transcode] ffmpeg failed (${err.message}), raw recording retained at ${rawPath}`);
        this.emit("done", { rawPath, outputPath, success: false, error: err.message });
      });

    this.activeCommands.set(rawPath, command);
    command.run();
  }

  /**
   * Kills every conversion without waiting; their raw files stay on disk.
   * ffmpeg cannot be signalled before it has spawned, so those commands are
   * killed from their `start` event instead.
   */
  cancelAll(): void {
    for (const [rawPath, command] of this.activeCommands) {
      console.log(`[Transcode] Cancelling conversion of ${rawPath}`);
      if (this.startedCommands.has(command)) {
        command.kill("SIGKILL");
      } else {
        this.cancelledCommands.add(command);
      }
    }
    this.activeCommands.clear();
  }

  private finishConverted(rawPath: string, outputPath: string): void {
    console.log(`[Transcode] Created ${outputPath}, removing raw file ${rawPath}`);

    this.removeFile(rawPath)
      .catch((err: unknown) => {
        console.error(`[Transcode] Could not remove raw file ${rawPath}:`, err);
      })
      .finally(() => {
        this.emit("done", { rawPath, outputPath, success: true });
      });
  }
}
