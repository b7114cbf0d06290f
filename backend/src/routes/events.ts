import { Router } from "express";
import { toAddress } from "../../../sdk/core/src";
import { getEvents, getPurchases, type Db } from "../db/schema";
import { queryInt, queryString } from "./params";

export function eventsRouter(db: Db): Router {
  const router = Router();

  router.get("/events", (req, res) => {
    const events = getEvents(db, {
      type: queryString(req.query.type),
      sale: queryInt(req.query.sale, "sale"),
      limit: queryInt(req.query.limit, "limit") ?? 50,
      offset: queryInt(req.query.offset, "offset") ?? 0,
    });
    res.json({ events, count: events.length });
  });

  router.get("/purchases", (req, res) => {
    const buyer = queryString(req.query.buyer);
    const referral = req.query.referral;
    const purchases = getPurchases(db, {
      sale: queryInt(req.query.sale, "sale"),
      buyer: buyer ? toAddress(buyer, "buyer") : undefined,
      referral: typeof referral === "string" ? referral : undefined,
      limit: queryInt(req.query.limit, "limit") ?? 50,
      offset: queryInt(req.query.offset, "offset") ?? 0,
    });
    res.json({ purchases, count: purchases.length });
  });

  return router;
}
