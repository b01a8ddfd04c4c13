import { loadConfig } from "./config.js";
import { buildApp, TRANSCRIBE_ROUTE } from "./app.js";

const cfg = loadConfig();
const app = buildApp({ config: cfg });

if (!cfg.assemblyAiApiKey) {
  app.log.warn("ASSEMBLYAI_API_KEY not set; transcription requests will fail");
}

const start = async () => {
  try {
    await app.listen({ port: cfg.port, host: cfg.host });
    app.log.info(`YouTube transcription endpoint: POST ${TRANSCRIBE_ROUTE}`);
  } catch (err) {
    app.log.error(err);
    process.exit(1);
  }
};

const shutdown = (signal: NodeJS.Signals) => {
  app.log.info(`Received ${signal}, shutting down`);
  app.close().then(
    () => process.exit(0),
    (err: unknown) => {
      app.log.error({ err }, "Error during shutdown");
      process.exit(1);
    }
  );
};

process.on("SIGINT", shutdown);
process.on("SIGTERM", shutdown);

await start();
