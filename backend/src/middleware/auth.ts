import type { NextFunction, Request, RequestHandler, Response } from "express";

export function apiKeyAuth(apiKey: string): RequestHandler {
  return (req: Request, res: Response, next: NextFunction): void => {
    // Health endpoint is always public
    if (req.path === "/health") return next();

    const key = req.get("x-api-key");
    if (!key || key !== apiKey) {
      res.status(401).json({ error: "Invalid or missing API key", code: "UNAUTHENTICATED" });
      return;
    }
    next();
  };
}
