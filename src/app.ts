import express from "express";
import cors from "cors";
import helmet from "helmet";
import morgan from "morgan";
import rateLimit from "express-rate-limit";
import compression from "compression";
import { env } from "./config/env";
import { HttpError } from "./lib/httpError";
import { attachRequestContext } from "./middleware/requestContext";
import urlRoutes from "./routes/url";
import listRoutes from "./routes/lists";

export const app = express();

const globalLimiter = rateLimit({ windowMs: 15 * 60 * 1000, max: 1200, standardHeaders: true, legacyHeaders: false });
const urlCheckLimiter = rateLimit({
  windowMs: 60 * 1000,
  max: env.checkRateLimitPerMinute,
  standardHeaders: true,
  legacyHeaders: false
});
const listWriteLimiter = rateLimit({ windowMs: 15 * 60 * 1000, max: 60, standardHeaders: true, legacyHeaders: false });

app.use(
  helmet({
    contentSecurityPolicy: {
      directives: {
        defaultSrc: ["'none'"],
        frameAncestors: ["'none'"]
      }
    }
  })
);
app.use(cors({ origin: env.corsOrigin }));
app.use(compression());
app.use(express.json({ limit: "16kb" }));
app.use(attachRequestContext);
app.use(morgan(env.nodeEnv === "production" ? "combined" : "dev", { skip: () => env.nodeEnv === "test" }));
app.use(globalLimiter);

app.get("/health", (_req, res) => {
  res.json({ ok: true, service: "url-verdict-server", timestamp: new Date().toISOString() });
});

app.use("/api/url/check", urlCheckLimiter);
app.post("/api/lists/:list/entries", listWriteLimiter);

app.use("/api/url", urlRoutes);
app.use("/api/lists", listRoutes);

// body-parser errors carry `status` (e.g. 400 for malformed JSON)
function statusOf(err: Error): number {
  if (err instanceof HttpError) return err.statusCode;
  if ("status" in err && typeof err.status === "number" && err.status >= 400 && err.status < 600) return err.status;
  return 500;
}

app.use((_req, res) => {
  res.status(404).json({ error: "Route not found", requestId: res.locals.requestId });
});

app.use((err: Error, req: express.Request, res: express.Response, _next: express.NextFunction) => {
  const requestId = req.requestId || `${Date.now().toString(36)}-${Math.random().toString(36).slice(2, 8)}`;
  const statusCode = statusOf(err);
  console.error(
    JSON.stringify({
      requestId,
      statusCode,
      message: err.message,
      stack: env.nodeEnv === "production" ? undefined : err.stack,
      path: req.path,
      method: req.method,
      at: new Date().toISOString()
    })
  );

  const safeMessage = statusCode >= 500 && env.nodeEnv === "production" ? "Internal server error" : err.message || "Unexpected error";
  res.status(statusCode).json({ error: safeMessage, requestId });
});
