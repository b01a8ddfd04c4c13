import fs, { type ReadStream } from "node:fs";
import { setTimeout as delay } from "node:timers/promises";
import { request, type Dispatcher } from "undici";
import { z } from "zod";
import { POLL_INTERVAL_MS, POLL_MAX_ATTEMPTS } from "../constants.js";
import { fail, ok } from "../types.js";
import type { Logger, ProviderError, Result, TranscriptionJob } from "../types.js";

export type Sleep = (ms: number, signal?: AbortSignal) => Promise<void>;

export interface AssemblyAIConfig {
  apiKey?: string;
  baseUrl: string;
  pollIntervalMs?: number;
  maxPollAttempts?: number;
  sleep?: Sleep; // injectable so tests do not wait for real
  dispatcher?: Dispatcher;
  log?: Logger;
}

export interface TranscriptionClient {
  upload(filePath: string, signal?: AbortSignal): Promise<Result<string, ProviderError>>;
  submit(uploadUrl: string, signal?: AbortSignal): Promise<Result<string, ProviderError>>;
  pollUntilDone(jobId: string, signal?: AbortSignal): Promise<Result<string, ProviderError>>;
  transcribe(uploadUrl: string, signal?: AbortSignal): Promise<Result<string, ProviderError>>;
}

const UploadResponseSchema = z.object({ upload_url: z.string().min(1) });

const SubmitResponseSchema = z.object({ id: z.string().min(1) });

const TranscriptResponseSchema = z.object({
  id: z.string().optional(),
  status: z.string(),
  text: z.string().nullish(),
  error: z.string().nullish(),
});

export type PollStep =
  | { type: "done"; text: string }
  | { type: "failed"; error: ProviderError }
  | { type: "wait" };

/**
 * Transition for one observed job state. `error` is terminal: the provider
 * does not recover a failed job, so there is nothing to retry.
 */
export function nextPollStep(job: TranscriptionJob): PollStep {
  switch (job.status) {
    case "completed":
      return { type: "done", text: job.resultText ?? "" };
    case "error":
      return {
        type: "failed",
        error: {
          kind: "TranscriptionFailed",
          message: `Transcription failed: ${job.error || "Unknown error"}`,
        },
      };
    default:
      // queued, processing, or anything the provider adds later
      return { type: "wait" };
  }
}

const defaultSleep: Sleep = async (ms, signal) => {
  await delay(ms, undefined, { signal });
};

const CANCELLED: ProviderError = { kind: "Cancelled", message: "Transcription cancelled" };

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export class AssemblyAIClient implements TranscriptionClient {
  private readonly baseUrl: string;
  private readonly pollIntervalMs: number;
  private readonly maxPollAttempts: number;
  private readonly sleep: Sleep;

  constructor(private readonly config: AssemblyAIConfig) {
    this.baseUrl = config.baseUrl.replace(/\/+$/, "");
    this.pollIntervalMs = config.pollIntervalMs ?? POLL_INTERVAL_MS;
    this.maxPollAttempts = config.maxPollAttempts ?? POLL_MAX_ATTEMPTS;
    this.sleep = config.sleep ?? defaultSleep;
  }

  private missingKey(): ProviderError {
    return { kind: "ConfigMissing", message: "ASSEMBLYAI_API_KEY not set" };
  }

  private async send(
    method: "GET" | "POST",
    path: string,
    body?: { json: unknown } | { stream: ReadStream },
    signal?: AbortSignal
  ): Promise<{ statusCode: number; text: string }> {
    const headers: Record<string, string> = { authorization: this.config.apiKey ?? "" };
    let payload: string | ReadStream | undefined;
    if (body && "json" in body) {
      headers["content-type"] = "application/json";
      payload = JSON.stringify(body.json);
    } else if (body) {
      headers["content-type"] = "application/octet-stream";
      payload = body.stream;
    }

    const res = await request(`${this.baseUrl}${path}`, {
      method,
      headers,
      body: payload,
      dispatcher: this.config.dispatcher,
      signal,
    });
    const text = await res.body.text();
    return { statusCode: res.statusCode, text };
  }

  private parse<T>(text: string, schema: z.ZodType<T>): T | undefined {
    let raw: unknown;
    try {
      raw = JSON.parse(text);
    } catch {
      return undefined;
    }
    const parsed = schema.safeParse(raw);
    return parsed.success ? parsed.data : undefined;
  }

  async upload(filePath: string, signal?: AbortSignal): Promise<Result<string, ProviderError>> {
    if (!this.config.apiKey) return fail(this.missingKey());
    if (signal?.aborted) return fail(CANCELLED);

    const stream = fs.createReadStream(filePath);
    try {
      const res = await this.send("POST", "/v2/upload", { stream }, signal);
      if (res.statusCode < 200 || res.statusCode >= 300) {
        return fail({ kind: "UploadFailed", message: `Failed to upload audio: ${res.text}` });
      }
      const body = this.parse(res.text, UploadResponseSchema);
      if (!body) {
        return fail({ kind: "UploadFailed", message: `Failed to upload audio: unexpected response ${res.text}` });
      }
      return ok(body.upload_url);
    } catch (error) {
      if (signal?.aborted) return fail(CANCELLED);
      return fail({ kind: "UploadFailed", message: `Failed to upload audio: ${errorMessage(error)}` });
    } finally {
      stream.destroy();
    }
  }

  async submit(uploadUrl: string, signal?: AbortSignal): Promise<Result<string, ProviderError>> {
    if (!this.config.apiKey) return fail(this.missingKey());
    if (signal?.aborted) return fail(CANCELLED);

    try {
      const res = await this.send("POST", "/v2/transcript", { json: { audio_url: uploadUrl } }, signal);
      if (res.statusCode < 200 || res.statusCode >= 300) {
        return fail({ kind: "SubmitFailed", message: `Failed to submit transcription: ${res.text}` });
      }
      const body = this.parse(res.text, SubmitResponseSchema);
      if (!body) {
        return fail({ kind: "SubmitFailed", message: `Failed to submit transcription: unexpected response ${res.text}` });
      }
      return ok(body.id);
    } catch (error) {
      if (signal?.aborted) return fail(CANCELLED);
      return fail({ kind: "SubmitFailed", message: `Failed to submit transcription: ${errorMessage(error)}` });
    }
  }

  async getJob(jobId: string): Promise<Result<TranscriptionJob, ProviderError>> {
    try {
      const res = await this.send("GET", `/v2/transcript/${encodeURIComponent(jobId)}`);
      if (res.statusCode < 200 || res.statusCode >= 300) {
        return fail({ kind: "PollFailed", message: `Failed to poll transcription: ${res.text}` });
      }
      const body = this.parse(res.text, TranscriptResponseSchema);
      if (!body) {
        return fail({ kind: "PollFailed", message: `Failed to poll transcription: unexpected response ${res.text}` });
      }
      return ok({
        jobId,
        status: body.status,
        resultText: body.text ?? undefined,
        error: body.error ?? undefined,
      });
    } catch (error) {
      return fail({ kind: "PollFailed", message: `Failed to poll transcription: ${errorMessage(error)}` });
    }
  }

  async pollUntilDone(jobId: string, signal?: AbortSignal): Promise<Result<string, ProviderError>> {
    if (!this.config.apiKey) return fail(this.missingKey());

    for (let attempt = 1; attempt <= this.maxPollAttempts; attempt++) {
      if (signal?.aborted) return fail(CANCELLED);

      const polled = await this.getJob(jobId);
      if (!polled.ok) return polled;

      const step = nextPollStep(polled.value);
      if (step.type === "done") return ok(step.text);
      if (step.type === "failed") return fail(step.error);

      this.config.log?.debug({ jobId, attempt, status: polled.value.status }, "Transcription not ready");
      try {
        await this.sleep(this.pollIntervalMs, signal);
      } catch (error) {
        if (signal?.aborted) return fail(CANCELLED);
        throw error;
      }
    }

    return fail({ kind: "TranscriptionTimeout", message: "Transcription timed out" });
  }

  async transcribe(uploadUrl: string, signal?: AbortSignal): Promise<Result<string, ProviderError>> {
    const submitted = await this.submit(uploadUrl, signal);
    if (!submitted.ok) return submitted;
    return this.pollUntilDone(submitted.value, signal);
  }
}
