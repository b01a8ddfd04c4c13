import path from "node:path";
import fs from "node:fs";
import crypto from "node:crypto";
import type { ServiceConfig } from "../config.js";
import {
  AUDIO_FORMATS,
  FALLBACK_TITLE,
  REQUESTED_AUDIO_FORMAT,
  isAudioFormat,
} from "../constants.js";
import { runCommand, type CommandRunner } from "../utils/process.js";
import { fail, ok } from "../types.js";
import type { AudioAsset, Logger, Result, RetrieverError } from "../types.js";

export type RetrieverConfig = Pick<
  ServiceConfig,
  "audioDir" | "ytdlpCmd" | "ffmpegCmd" | "titleTimeoutMs" | "downloadTimeoutMs"
>;

export interface AudioRetriever {
  fetchTitle(url: string): Promise<string>;
  downloadAudio(url: string, signal?: AbortSignal): Promise<Result<AudioAsset, RetrieverError>>;
}

/**
 * Unique output path per call; the UUID keeps concurrent requests
 * that start within the same millisecond apart.
 */
export function newAudioOutputPath(audioDir: string): string {
  return path.join(
    audioDir,
    `yt_audio_${Date.now()}_${crypto.randomUUID()}.${REQUESTED_AUDIO_FORMAT}`
  );
}

/**
 * Paths yt-dlp may have written for a requested output path, in probe order.
 * It sometimes appends the extension again or keeps the source container.
 */
export function audioCandidates(outputPath: string): string[] {
  const ext = path.extname(outputPath);
  const base = ext ? outputPath.slice(0, -ext.length) : outputPath;
  const candidates = [
    outputPath,
    `${outputPath}.${REQUESTED_AUDIO_FORMAT}`,
    ...AUDIO_FORMATS.map((format) => `${base}.${format}`),
  ];
  return [...new Set(candidates)];
}

function formatOf(filePath: string) {
  const ext = path.extname(filePath).slice(1).toLowerCase();
  return isAudioFormat(ext) ? ext : REQUESTED_AUDIO_FORMAT;
}

export function createAudioRetriever(
  cfg: RetrieverConfig,
  log: Logger,
  run: CommandRunner = runCommand
): AudioRetriever {
  async function fetchTitle(url: string): Promise<string> {
    const outcome = await run(cfg.ytdlpCmd, ["--get-title", "--no-warnings", url], {
      timeoutMs: cfg.titleTimeoutMs,
    });
    if (outcome.status === "ok" && outcome.stdout.trim()) {
      return outcome.stdout.trim();
    }
    log.warn({ url, outcome: outcome.status }, "Could not fetch video title, using fallback");
    return FALLBACK_TITLE;
  }

  async function removePartialOutput(outputPath: string): Promise<void> {
    const leftovers = audioCandidates(outputPath).flatMap((p) => [p, `${p}.part`]);
    await Promise.all(
      leftovers.map((p) =>
        fs.promises.rm(p, { force: true }).catch((error: unknown) => {
          log.warn({ err: error, path: p }, "Failed to remove partial download");
        })
      )
    );
  }

  async function downloadAudio(
    url: string,
    signal?: AbortSignal
  ): Promise<Result<AudioAsset, RetrieverError>> {
    const outputPath = newAudioOutputPath(cfg.audioDir);
    const args = [
      "-f", "bestaudio",
      "-x", // extract audio
      "--audio-format", REQUESTED_AUDIO_FORMAT,
      "--no-playlist",
      "--no-warnings",
      ...(cfg.ffmpegCmd ? ["--ffmpeg-location", cfg.ffmpegCmd] : []),
      "-o", outputPath,
      url,
    ];

    const outcome = await run(cfg.ytdlpCmd, args, {
      timeoutMs: cfg.downloadTimeoutMs,
      signal,
    });

    switch (outcome.status) {
      case "ok":
        break;
      case "missing":
        return fail({ kind: "ToolUnavailable", message: `${cfg.ytdlpCmd} not installed or not on PATH` });
      case "timeout":
        await removePartialOutput(outputPath);
        return fail({ kind: "DownloadTimeout", message: "Timeout while downloading video" });
      case "aborted":
        await removePartialOutput(outputPath);
        return fail({ kind: "Cancelled", message: "Download cancelled" });
      case "exit":
        await removePartialOutput(outputPath);
        return fail({ kind: "DownloadFailed", message: `yt-dlp error: ${outcome.stderr.trim()}` });
    }

    const found = audioCandidates(outputPath).find((p) => fs.existsSync(p));
    if (!found) {
      return fail({ kind: "FileNotFound", message: "Audio file not found after download" });
    }
    return ok({ localPath: found, format: formatOf(found) });
  }

  return { fetchTitle, downloadAudio };
}
