import cors from "cors";
import express from "express";
import helmet from "helmet";
import type { Logger } from "pino";
import { bigintReplacer, type SaleDesk } from "../../sdk/core/src";
import type { Db } from "./db/schema";
import { apiKeyAuth } from "./middleware/auth";
import { errorHandler } from "./middleware/errors";
import { adminRouter } from "./routes/admin";
import { eventsRouter } from "./routes/events";
import { salesRouter } from "./routes/sales";
import { webhooksRouter } from "./routes/webhooks";
import type { WebhookService } from "./services/webhook";

export interface AppDeps {
  desk: SaleDesk;
  db: Db;
  webhookService: WebhookService;
  logger: Logger;
  apiKey: string;
}

export function createApp({ desk, db, webhookService, logger, apiKey }: AppDeps): express.Express {
  const app = express();
  app.set("json replacer", bigintReplacer);
  app.use(helmet());
  app.use(cors());
  app.use(express.json());
  app.use(apiKeyAuth(apiKey));

  // Health endpoint
  app.get("/health", (_req, res) => {
    res.json({ status: "ok", desk: desk.address, sales: desk.saleCount, uptime: process.uptime() });
  });

  // Routes
  app.use("/api", salesRouter(desk));
  app.use("/api", adminRouter(desk));
  app.use("/api", eventsRouter(db));
  app.use("/api", webhooksRouter(webhookService));

  app.use(errorHandler(logger));
  return app;
}
