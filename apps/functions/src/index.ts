import "dotenv/config";
import { onRequest } from "firebase-functions/v2/https";
import * as logger from "firebase-functions/logger";
import { getApps, initializeApp } from "firebase-admin/app";
import cors from "cors";
import { createApp } from "./api/app.js";
import { loadConfig } from "./api/config.js";
import { createDefaultDeps } from "./api/deps.js";
import { requestHandler } from "./api/handler.js";

if (getApps().length === 0) {
  initializeApp();
}

const config = loadConfig();
const handler = requestHandler(createApp(createDefaultDeps(config), config));
const corsHandler = cors({
  origin: config.corsOrigin ?? true,
  methods: ["GET", "POST", "OPTIONS"],
  allowedHeaders: ["Content-Type", "Authorization"]
});

export const api = onRequest((req, res) => {
  logger.info("api called", { method: req.method, path: req.path });
  corsHandler(req, res, () => {
    handler(req, res).catch((error: unknown) => {
      logger.error("api handler failed", error);
      res.status(500).json({ ok: false, code: "INTERNAL_ERROR", message: "Internal server error" });
    });
  });
});
