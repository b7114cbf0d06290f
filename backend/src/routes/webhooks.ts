import { Router } from "express";
import { NotFoundError, ValidationError } from "../../../sdk/core/src";
import type { WebhookService } from "../services/webhook";
import { optionalString, parseIndex, readBody, requireString } from "./params";

export function webhooksRouter(webhookService: WebhookService): Router {
  const router = Router();

  router.get("/webhooks", (_req, res) => {
    res.json({ webhooks: webhookService.list() });
  });

  router.post("/webhooks", (req, res) => {
    const body = readBody(req);
    const url = requireString(body, "url");
    const events: unknown[] = Array.isArray(body.events) ? body.events : [];
    const names = events.filter((e): e is string => typeof e === "string" && e.length > 0);
    if (names.length === 0 || names.length !== events.length) {
      throw new ValidationError("url and events[] are required");
    }
    const id = webhookService.register(url, names, optionalString(body, "secret"));
    res.status(201).json({ id, url, events: names });
  });

  router.delete("/webhooks/:id", (req, res) => {
    const id = parseIndex(req.params.id, "webhook id");
    if (!webhookService.remove(id)) throw new NotFoundError(`Webhook ${id} not found`);
    res.json({ deleted: true });
  });

  return router;
}
