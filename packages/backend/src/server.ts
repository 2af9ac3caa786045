import { dirname, resolve } from "node:path";
import { fileURLToPath } from "node:url";
import cors from "cors";
import express, { type Express, type NextFunction, type Request, type Response } from "express";
import { requestLogger } from "./middleware/logger.js";
import { createAuthRouter } from "./routes/auth.js";
import { createChatRouter } from "./routes/chat.js";
import { createCollectionsRouter } from "./routes/collections.js";
import { createConfigRouter } from "./routes/config.js";
import { createDebugRouter } from "./routes/debug.js";
import { createFeedsRouter } from "./routes/feeds.js";
import { createHealthRouter } from "./routes/health.js";
import { createUiRouter } from "./routes/ui.js";
import { checkDependencies } from "./runtime/connectivity.js";
import type { RagRuntime } from "./runtime/ragRuntime.js";
import { logger } from "./utils/logger.js";

const packageRoot = resolve(dirname(fileURLToPath(import.meta.url)), "..");

export function createApp(runtime: RagRuntime): Express {
  const { config } = runtime;
  const dependencyChecks = () => checkDependencies(runtime);

  const app = express();

  app.use(requestLogger);
  app.use(cors({ origin: config.CORS_ORIGIN }));
  app.use(express.json({ limit: "1mb" }));

  app.use("/static", express.static(resolve(packageRoot, "static")));
  app.use("/", createUiRouter({ templatePath: resolve(packageRoot, "templates/index.html") }));

  app.use(
    "/api/health",
    createHealthRouter({ checkDependencies: dependencyChecks, startTime: runtime.startTime })
  );
  app.use(
    "/api/chat",
    createChatRouter({
      chatService: runtime.chatService,
      defaultCollection: config.DEFAULT_COLLECTION,
      errorDetail: config.CHAT_ERROR_DETAIL
    })
  );
  app.use(
    "/api/collections",
    createCollectionsRouter({ registry: runtime.registry, vectorStore: runtime.vectorStore })
  );
  app.use(
    "/api/config",
    createConfigRouter({
      config,
      registry: runtime.registry,
      checkDependencies: dependencyChecks
    })
  );
  app.use("/api", createFeedsRouter());
  app.use("/auth", createAuthRouter());

  if (config.ENABLE_DEBUG_ROUTES) {
    app.use("/api/debug", createDebugRouter({ chatService: runtime.chatService }));
  }

  app.use((_req, res) => {
    res.status(404).json({ error: "Route not found" });
  });

  app.use((err: unknown, _req: Request, res: Response, _next: NextFunction) => {
    if (err instanceof SyntaxError && "body" in err) {
      res.status(400).json({ error: "Malformed JSON body" });
      return;
    }
    if (isClientHttpError(err)) {
      res.status(err.status).json({ error: err.expose ? err.message : "Bad request" });
      return;
    }

    logger.error({ err }, "Unhandled error");
    res.status(500).json({ error: "Internal server error" });
  });

  return app;
}

// body-parser raises http-errors instances carrying a 4xx status and an expose flag.
function isClientHttpError(err: unknown): err is Error & { status: number; expose?: boolean } {
  return (
    err instanceof Error &&
    "status" in err &&
    typeof err.status === "number" &&
    err.status >= 400 &&
    err.status < 500
  );
}
