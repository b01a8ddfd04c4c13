import type { FastifyBaseLogger } from "fastify";
import type { AudioFormat } from "./constants.js";

export type Logger = Pick<FastifyBaseLogger, "debug" | "info" | "warn" | "error">;

export type Result<T, E> = { ok: true; value: T } | { ok: false; error: E };

export function ok<T>(value: T): { ok: true; value: T } {
  return { ok: true, value };
}

export function fail<E>(error: E): { ok: false; error: E } {
  return { ok: false, error };
}

export interface TranscriptionRequest {
  url: string;
}

export interface VideoIdentity {
  videoId: string;
  title: string;
}

export interface AudioAsset {
  localPath: string;
  format: AudioFormat;
}

export type TranscriptStatus = "queued" | "processing" | "completed" | "error";

export interface TranscriptionJob {
  jobId: string;
  status: TranscriptStatus | (string & {});
  resultText?: string;
  error?: string;
}

export type TranscriptionResult =
  | { success: true; transcript: string; title: string; videoId: string }
  | { success: false; error: string };

// Error kinds, one union per component boundary

export interface ClientInputError {
  kind: "MissingField" | "InvalidUrl";
  message: string;
}

export interface RetrieverError {
  kind: "DownloadFailed" | "DownloadTimeout" | "ToolUnavailable" | "FileNotFound" | "Cancelled";
  message: string;
}

export interface ProviderError {
  kind:
    | "ConfigMissing"
    | "UploadFailed"
    | "SubmitFailed"
    | "PollFailed"
    | "TranscriptionFailed"
    | "TranscriptionTimeout"
    | "Cancelled";
  message: string;
}

export type WorkflowError = ClientInputError | RetrieverError | ProviderError;

export interface WorkflowResponse {
  statusCode: 200 | 400 | 500;
  payload: TranscriptionResult;
}
