import express, { Request, Response } from "express";
import cors from "cors";
import dotenv from "dotenv";
import * as z from "zod";
import { resolveAppConfig } from "./config/appConfig.js";
import { createRuntime } from "./bootstrap.js";
import type { ChatOrchestrator } from "./langgraph/orchestrator.js";
import type { SessionStore } from "./store/session-store.js";
import { BILINGUAL_RETRY_TEXT } from "./langgraph/core/config/messaging.js";
import { LanguageSchema } from "./langgraph/state.js";
import { logger } from "./observability/logger.js";

const ChatRequestSchema = z.object({
  user_id: z.string().trim().min(1),
  user_input: z.string().trim().min(1),
});

const ResetRequestSchema = z.object({
  user_id: z.string().trim().min(1),
});

const LanguageOverrideSchema = z.object({
  user_id: z.string().trim().min(1),
  language: LanguageSchema,
});

export function createApp(orchestrator: ChatOrchestrator, store: SessionStore) {
  const app = express();
  app.use(cors());
  app.use(express.json());

  app.post("/whatsapp/chat", async (req: Request, res: Response) => {
    const parsed = ChatRequestSchema.safeParse(req.body);
    if (!parsed.success) {
      return res.status(400).json({ status: "error", response: BILINGUAL_RETRY_TEXT });
    }
    const { user_id, user_input } = parsed.data;
    const response = await orchestrator.handle(user_id, user_input);
    return res.json({ status: "success", response });
  });

  app.post("/whatsapp/reset", async (req: Request, res: Response) => {
    const parsed = ResetRequestSchema.safeParse(req.body);
    if (!parsed.success) {
      return res.status(400).json({ status: "error", message: "user_id is required" });
    }
    const removed = await orchestrator.reset(parsed.data.user_id);
    return res.json({ status: "success", removed });
  });

  app.post("/whatsapp/language", async (req: Request, res: Response) => {
    const parsed = LanguageOverrideSchema.safeParse(req.body);
    if (!parsed.success) {
      return res.status(400).json({ status: "error", message: "user_id and language (fr|es) are required" });
    }
    try {
      const session = await orchestrator.overrideLanguage(parsed.data.user_id, parsed.data.language);
      return res.json({ status: "success", session });
    } catch (error) {
      logger.error({ err: error }, "Language override failed");
      return res.status(500).json({ status: "error", message: "Language override failed" });
    }
  });

  app.get("/whatsapp/status/:userId", async (req: Request, res: Response) => {
    try {
      const session = await orchestrator.status(req.params.userId);
      if (!session) return res.status(404).json({ status: "not_found" });
      return res.json({ status: "success", session });
    } catch (error) {
      logger.error({ err: error }, "Status lookup failed");
      return res.status(500).json({ status: "error", message: "Status lookup failed" });
    }
  });

  app.get("/health", (_req: Request, res: Response) => {
    res.json({ status: "ok", store: store.status() });
  });

  return app;
}

if (require.main === module) {
  dotenv.config();
  const { config, store, orchestrator } = createRuntime(resolveAppConfig());
  createApp(orchestrator, store).listen(config.port, () => {
    logger.info({ port: config.port }, "Server started");
  });
}
