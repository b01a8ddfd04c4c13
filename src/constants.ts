/**
 * Defaults shared by the config loader and the pipeline.
 * Timeouts and intervals are in milliseconds.
 */

export const DEFAULT_SERVICE_NAME = "flow-backend";

export const DEFAULT_ASSEMBLYAI_BASE_URL = "https://api.assemblyai.com";

export const TITLE_TIMEOUT_MS = 15_000;
export const DOWNLOAD_TIMEOUT_MS = 120_000;

// 120 polls x 3s = 6 minutes of waiting for long videos
export const POLL_INTERVAL_MS = 3_000;
export const POLL_MAX_ATTEMPTS = 120;

export const FALLBACK_TITLE = "YouTube Video";

// Containers yt-dlp may leave behind; the first one is the requested format
export const AUDIO_FORMATS = ["mp3", "m4a", "webm", "opus"] as const;

export type AudioFormat = (typeof AUDIO_FORMATS)[number];

export const REQUESTED_AUDIO_FORMAT: AudioFormat = "mp3";

export function isAudioFormat(value: string): value is AudioFormat {
  return AUDIO_FORMATS.includes(value as AudioFormat);
}

export const MESSAGES = {
  missingUrl: "Missing 'url' in request body",
  invalidUrl: "Invalid YouTube URL",
} as const;
