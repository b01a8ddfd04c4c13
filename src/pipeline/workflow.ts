import { z } from "zod";
import { MESSAGES } from "../constants.js";
import { fail, ok } from "../types.js";
import type {
  ClientInputError,
  Logger,
  ProviderError,
  Result,
  TranscriptionRequest,
  VideoIdentity,
  WorkflowError,
  WorkflowResponse,
} from "../types.js";
import { withAudioAsset } from "./audioAsset.js";
import type { AudioRetriever } from "./download.js";
import type { TranscriptionClient } from "./transcribe_assemblyai.js";
import { extractVideoId } from "./videoId.js";

export interface WorkflowDeps {
  retriever: AudioRetriever;
  transcriber: TranscriptionClient;
}

const TranscribeBodySchema = z.object({
  url: z.string(),
});

export function parseTranscriptionRequest(body: unknown): Result<TranscriptionRequest, ClientInputError> {
  const hasUrl =
    typeof body === "object" && body !== null && "url" in body && body.url !== undefined && body.url !== null;
  if (!hasUrl) {
    return fail({ kind: "MissingField", message: MESSAGES.missingUrl });
  }
  const parsed = TranscribeBodySchema.safeParse(body);
  if (!parsed.success) {
    return fail({ kind: "InvalidUrl", message: MESSAGES.invalidUrl });
  }
  return ok({ url: parsed.data.url });
}

function failure(statusCode: 400 | 500, error: WorkflowError): WorkflowResponse {
  return { statusCode, payload: { success: false, error: error.message } };
}

/**
 * Validate, download, upload, transcribe. The downloaded file never
 * outlives the call, whichever step fails.
 */
export async function handleTranscriptionRequest(
  body: unknown,
  deps: WorkflowDeps,
  log: Logger,
  signal?: AbortSignal
): Promise<WorkflowResponse> {
  const request = parseTranscriptionRequest(body);
  if (!request.ok) {
    return failure(400, request.error);
  }

  const { url } = request.value;
  const videoId = extractVideoId(url);
  if (!videoId) {
    return failure(400, { kind: "InvalidUrl", message: MESSAGES.invalidUrl });
  }

  const identity: VideoIdentity = { videoId, title: await deps.retriever.fetchTitle(url) };

  log.info(`[Transcribe] Downloading audio for video: ${videoId}`);
  const outcome = await withAudioAsset(
    () => deps.retriever.downloadAudio(url, signal),
    async (asset): Promise<Result<string, ProviderError>> => {
      log.info(`[Transcribe] Downloaded to: ${asset.localPath}`);

      log.info("[Transcribe] Uploading to AssemblyAI...");
      const uploaded = await deps.transcriber.upload(asset.localPath, signal);
      if (!uploaded.ok) return uploaded;

      log.info("[Transcribe] Uploaded, starting transcription...");
      return deps.transcriber.transcribe(uploaded.value, signal);
    },
    log
  );

  if (!outcome.ok) {
    log.error({ videoId, kind: outcome.error.kind }, `[Transcribe] Error: ${outcome.error.message}`);
    return failure(500, outcome.error);
  }

  const transcript = outcome.value;
  log.info(`[Transcribe] Transcription complete, ${transcript.length} chars`);
  return {
    statusCode: 200,
    payload: { success: true, transcript, ...identity },
  };
}
