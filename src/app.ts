import Fastify, { type FastifyInstance, type FastifyServerOptions } from "fastify";
import cors from "@fastify/cors";
import type { ServiceConfig } from "./config.js";
import { MESSAGES } from "./constants.js";
import type { Logger } from "./types.js";
import { createAudioRetriever } from "./pipeline/download.js";
import { AssemblyAIClient } from "./pipeline/transcribe_assemblyai.js";
import { handleTranscriptionRequest, type WorkflowDeps } from "./pipeline/workflow.js";

export const TRANSCRIBE_ROUTE = "/api/transcribe-youtube";

export interface AppOptions {
  config: ServiceConfig;
  deps?: WorkflowDeps; // tests pass fakes
  logger?: FastifyServerOptions["logger"];
}

export function createWorkflowDeps(cfg: ServiceConfig, log: Logger): WorkflowDeps {
  return {
    retriever: createAudioRetriever(cfg, log),
    transcriber: new AssemblyAIClient({
      apiKey: cfg.assemblyAiApiKey,
      baseUrl: cfg.assemblyAiBaseUrl,
      pollIntervalMs: cfg.pollIntervalMs,
      maxPollAttempts: cfg.pollMaxAttempts,
      log,
    }),
  };
}

export function buildApp({ config: cfg, deps, logger }: AppOptions): FastifyInstance {
  const app = Fastify({
    logger: logger ?? { level: cfg.logLevel },
    connectionTimeout: 0,
    requestTimeout: 0, // download + polling can take several minutes
  });

  // Wide open for development clients
  app.register(cors, { origin: "*" });

  const workflowDeps = deps ?? createWorkflowDeps(cfg, app.log);

  app.setErrorHandler((error, request, reply) => {
    const statusCode = error.statusCode ?? 500;
    // Empty, malformed or non-JSON bodies never carry a url
    if (request.routeOptions.url === TRANSCRIBE_ROUTE && statusCode >= 400 && statusCode < 500) {
      request.log.warn({ err: error }, "Unreadable transcription request body");
      return reply.code(400).send({ success: false, error: MESSAGES.missingUrl });
    }
    request.log.error({ err: error }, "Request failed");
    return reply
      .code(statusCode >= 400 ? statusCode : 500)
      .send({ success: false, error: error.message });
  });

  app.get("/", async () => "Flow Backend is running! 🚀");

  app.get("/api/health", async () => ({ status: "healthy", service: cfg.serviceName }));

  app.post(TRANSCRIBE_ROUTE, async (request, reply) => {
    // Stop downloading and polling once the client has gone away
    const controller = new AbortController();
    const onClose = () => {
      if (!reply.raw.writableFinished) controller.abort();
    };
    reply.raw.once("close", onClose);

    try {
      const { statusCode, payload } = await handleTranscriptionRequest(
        request.body,
        workflowDeps,
        request.log,
        controller.signal
      );
      return reply.code(statusCode).send(payload);
    } finally {
      reply.raw.off("close", onClose);
    }
  });

  return app;
}
