import "dotenv/config";
import express from "express";
import compression from "compression";
import { createServer } from "http";
import { createDefaultDeps, registerRoutes } from "./routes";
import { getConfig } from "./config";
import { logAIConfig } from "./services/aiClientFactory";
import { log } from "./utils/log";

const app = express();
const httpServer = createServer(app);

// Enable gzip compression for all responses
app.use(compression({
  level: 6, // Balanced speed/compression
  threshold: 1024, // Only compress responses > 1KB
}));

app.use(express.json());
app.use(express.urlencoded({ extended: false }));

app.use((req, res, next) => {
  const start = Date.now();
  const path = req.path;

  res.on("finish", () => {
    const duration = Date.now() - start;
    if (path.startsWith("/api")) {
      // Bodies are not logged: they carry passwords and trip details
      log(`${req.method} ${path} ${res.statusCode} in ${duration}ms`);
    }
  });

  next();
});

(async () => {
  const config = getConfig();

  await registerRoutes(httpServer, app, createDefaultDeps(config));
  logAIConfig(config);

  httpServer.listen(
    {
      port: config.PORT,
      host: "0.0.0.0",
    },
    () => {
      log(`serving on port ${config.PORT}`);
    },
  );
})().catch((err: unknown) => {
  console.error("[Startup] Failed to start server:", err);
  process.exitCode = 1;
});
