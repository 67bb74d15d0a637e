import express, { Express } from "express";
import cors, { CorsOptions } from "cors";
import { AppConfig, loadConfigFromDotenv } from "./config";
import { ConfigurationError } from "./errors";
import { createMainRouter } from "./routes";
import { ChatService } from "./services/chat.service";
import {
  createOrchestrator,
  createSharedCollaborators,
} from "./services/orchestrator.service";
import { createLogger, setLogLevel } from "./utils/logger";

const log = createLogger("Server");

function corsOptions(allowedOrigins: string[] | null): CorsOptions {
  return {
    origin: (
      origin: string | undefined,
      callback: (err: Error | null, allow?: boolean) => void
    ) => {
      if (!origin) return callback(null, true);

      if (!allowedOrigins) return callback(null, true);

      if (allowedOrigins.indexOf(origin) !== -1) return callback(null, true);

      return callback(new Error("CORS policy: origin not allowed"), false);
    },
    methods: ["GET", "POST", "DELETE", "OPTIONS"],
    allowedHeaders: ["Content-Type", "Authorization", "Accept", "Origin"],
    optionsSuccessStatus: 204,
  };
}

export function createApp(config: AppConfig, chatService: ChatService): Express {
  const app = express();
  const options = corsOptions(config.corsOrigins);

  app.use((req, res, next) => {
    cors(options)(req, res, (err?: unknown) => {
      if (err) {
        log.warn("CORS blocked", { origin: req.header("Origin") });
        res.status(403).json({ error: "CORS blocked: origin not allowed" });
        return;
      }
      next();
    });
  });

  app.use(express.json());

  app.get("/", (req, res) => {
    res.status(200).json({
      message: "ok",
      now: new Date().toISOString(),
    });
  });

  app.use("/api", createMainRouter(chatService));

  return app;
}

function main() {
  let config: AppConfig;
  try {
    config = loadConfigFromDotenv();
  } catch (error) {
    if (error instanceof ConfigurationError) {
      log.error(`Configuration error: ${error.message}`);
      process.exit(1);
    }
    throw error;
  }

  setLogLevel(config.logLevel);

  const shared = createSharedCollaborators(config);
  const chatService = new ChatService(
    (sessionId) => createOrchestrator(sessionId, config, shared),
    config.sessionTtlMs
  );

  const app = createApp(config, chatService);
  app.listen(config.port, () => {
    log.info(`Server running at http://localhost:${config.port}`, {
      llm: config.llm.provider,
      pid: process.pid,
    });
  });
}

if (require.main === module) {
  main();
}
