import cors from "cors";
import express from "express";
import { z, ZodError } from "zod";
import { hasGoogleConfig } from "./config.js";
import { logger } from "./lib/logger.js";
import type { MailboxService } from "./services/mailboxService.js";
import type { Orchestrator } from "./services/orchestrator.js";
import { applicationEventSchema, FOLLOWUP_KINDS, WORKFLOW_STAGES } from "./types/workflow.js";

export interface AppDeps {
  orchestrator: Orchestrator;
  mailbox?: MailboxService;
  apiKey?: string;
  corsOrigins?: string[];
}

const asyncHandler =
  <T extends express.RequestHandler>(handler: T): express.RequestHandler =>
    async (req, res, next) => {
      try {
        await handler(req, res, next);
      } catch (error) {
        next(error);
      }
    };

const processSchema = z.object({
  event: applicationEventSchema,
  reprocess: z.boolean().optional().default(false),
});

const batchSchema = z.object({
  events: z.array(applicationEventSchema).max(500),
});

const followupSchema = z.object({
  kind: z.enum(FOLLOWUP_KINDS).default("information-required"),
});

const stageQuerySchema = z.object({
  stage: z.enum(WORKFLOW_STAGES).optional(),
});

const UNGUARDED_PATHS = new Set(["/api/health", "/api/mailbox/google/callback"]);

export const createApp = (deps: AppDeps): express.Express => {
  const app = express();
  const { orchestrator, mailbox } = deps;
  const allowedOrigins = new Set(deps.corsOrigins ?? []);

  app.use(
    cors({
      origin: (origin, callback) => {
        // No configured origins means any origin may call the API.
        if (!origin || allowedOrigins.size === 0 || allowedOrigins.has(origin)) {
          callback(null, true);
          return;
        }

        callback(null, false);
      },
      credentials: false,
    }),
  );

  app.use(express.json({ limit: "3mb" }));

  app.use("/api", (req, res, next) => {
    if (!deps.apiKey || UNGUARDED_PATHS.has(req.originalUrl.split("?")[0] ?? "")) {
      next();
      return;
    }
    if (req.header("x-api-key") !== deps.apiKey) {
      res.status(401).json({ error: "Unauthorized" });
      return;
    }
    next();
  });

  app.get("/api/health", (_req, res) => {
    res.json({ ok: true, service: "application-intake" });
  });

  app.get(
    "/api/health/dependencies",
    asyncHandler(async (_req, res) => {
      const dependencies = await orchestrator.checkDependencies();
      const ok = Object.values(dependencies).every((dependency) => dependency.ok);
      res.status(ok ? 200 : 503).json({ ok, dependencies });
    }),
  );

  app.get(
    "/api/metrics",
    asyncHandler(async (_req, res) => {
      const { registry } = orchestrator.metrics;
      res.set("Content-Type", registry.contentType);
      res.send(await registry.metrics());
    }),
  );

  app.post(
    "/api/applications/process",
    asyncHandler(async (req, res) => {
      const body = processSchema.parse(req.body);
      const report = await orchestrator.processOne(body.event, { reprocess: body.reprocess });
      res.json(report);
    }),
  );

  app.post(
    "/api/batches",
    asyncHandler(async (req, res) => {
      const body = batchSchema.parse(req.body);
      const report = await orchestrator.processBatch(body.events);
      res.json(report);
    }),
  );

  app.post(
    "/api/sync/run",
    asyncHandler(async (_req, res) => {
      const report = await orchestrator.pollAndProcess();
      res.json(report);
    }),
  );

  app.post(
    "/api/sync/followups",
    asyncHandler(async (req, res) => {
      const body = followupSchema.parse(req.body ?? {});
      const report = await orchestrator.processFollowups(body.kind);
      res.json(report);
    }),
  );

  app.get(
    "/api/applications",
    asyncHandler(async (req, res) => {
      const query = stageQuerySchema.parse(req.query);
      res.json(await orchestrator.listByStage(query.stage));
    }),
  );

  app.get(
    "/api/applications/:id",
    asyncHandler(async (req, res) => {
      const record = await orchestrator.getStatus(String(req.params.id));
      if (!record) {
        res.status(404).json({ error: "Application not found" });
        return;
      }
      res.json(record);
    }),
  );

  app.get(
    "/api/applications/:id/history",
    asyncHandler(async (req, res) => {
      const applicationId = String(req.params.id);
      const record = await orchestrator.getStatus(applicationId);
      if (!record) {
        res.status(404).json({ error: "Application not found" });
        return;
      }
      res.json(await orchestrator.getHistory(applicationId));
    }),
  );

  app.get(
    "/api/review-queue",
    asyncHandler(async (_req, res) => {
      res.json(await orchestrator.listReviewQueue());
    }),
  );

  app.get(
    "/api/review-queue/:studentId",
    asyncHandler(async (req, res) => {
      const entry = await orchestrator.findReviewEntry(String(req.params.studentId));
      if (!entry) {
        res.status(404).json({ error: "Review entry not found" });
        return;
      }
      res.json(entry);
    }),
  );

  app.get(
    "/api/mailbox/google/start",
    asyncHandler(async (_req, res) => {
      if (!mailbox || !hasGoogleConfig) {
        res.status(400).json({
          error: "Google OAuth is not configured. Set GOOGLE_CLIENT_ID and GOOGLE_CLIENT_SECRET.",
        });
        return;
      }
      res.json({ url: mailbox.getAuthUrl() });
    }),
  );

  app.get(
    "/api/mailbox/google/callback",
    asyncHandler(async (req, res) => {
      const code = typeof req.query.code === "string" ? req.query.code : "";
      if (!mailbox || !code) {
        res.status(400).json({ error: "Missing OAuth code" });
        return;
      }
      const account = await mailbox.handleOAuthCallback(code);
      res.json({ connected: true, email: account.email });
    }),
  );

  app.use((_req, res) => {
    res.status(404).json({ error: "Not found" });
  });

  app.use((error: unknown, _req: express.Request, res: express.Response, _next: express.NextFunction) => {
    if (error instanceof ZodError) {
      res.status(400).json({
        error: "Invalid request",
        issues: error.issues.map((issue) => ({ path: issue.path.join("."), message: issue.message })),
      });
      return;
    }
    logger.error("Request failed", error);
    const message = error instanceof Error ? error.message : "Unexpected server error";
    res.status(500).json({ error: message });
  });

  return app;
};
