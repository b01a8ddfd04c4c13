import "dotenv/config";
import path from "node:path";
import fs from "node:fs";
import os from "node:os";
import {
  DEFAULT_ASSEMBLYAI_BASE_URL,
  DEFAULT_SERVICE_NAME,
  DOWNLOAD_TIMEOUT_MS,
  POLL_INTERVAL_MS,
  POLL_MAX_ATTEMPTS,
  TITLE_TIMEOUT_MS,
} from "./constants.js";

export interface ServiceConfig {
  port: number;
  host: string;
  serviceName: string;
  logLevel: string;
  audioDir: string;
  ytdlpCmd: string;
  ffmpegCmd?: string; // passed to yt-dlp as --ffmpeg-location when set
  titleTimeoutMs: number;
  downloadTimeoutMs: number;
  // AssemblyAI
  assemblyAiApiKey?: string;
  assemblyAiBaseUrl: string;
  pollIntervalMs: number;
  pollMaxAttempts: number;
}

function ensureDir(dir: string) {
  if (!fs.existsSync(dir)) {
    fs.mkdirSync(dir, { recursive: true });
  }
}

function positiveInt(raw: string | undefined, fallback: number): number {
  const parsed = parseInt(raw || "", 10);
  return Number.isFinite(parsed) && parsed > 0 ? parsed : fallback;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): ServiceConfig {
  const audioDir = path.resolve(env.AUDIO_DIR || os.tmpdir());
  ensureDir(audioDir);

  return {
    port: positiveInt(env.PORT, 5000),
    host: env.HOST || "0.0.0.0",
    serviceName: env.SERVICE_NAME || DEFAULT_SERVICE_NAME,
    logLevel: env.LOG_LEVEL || "info",
    audioDir,
    ytdlpCmd: env.YTDLP_CMD || "yt-dlp",
    ffmpegCmd: env.FFMPEG_CMD || undefined,
    titleTimeoutMs: positiveInt(env.TITLE_TIMEOUT_MS, TITLE_TIMEOUT_MS),
    downloadTimeoutMs: positiveInt(env.DOWNLOAD_TIMEOUT_MS, DOWNLOAD_TIMEOUT_MS),
    assemblyAiApiKey: env.ASSEMBLYAI_API_KEY || undefined,
    assemblyAiBaseUrl: (env.ASSEMBLYAI_BASE_URL || DEFAULT_ASSEMBLYAI_BASE_URL).replace(/\/+$/, ""),
    pollIntervalMs: positiveInt(env.POLL_INTERVAL_MS, POLL_INTERVAL_MS),
    pollMaxAttempts: positiveInt(env.POLL_MAX_ATTEMPTS, POLL_MAX_ATTEMPTS),
  };
}
