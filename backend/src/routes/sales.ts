import { Router } from "express";
import { ValidationError, type Sale, type SaleDesk, type SalePatch, type TokensBought } from "../../../sdk/core/src";
import {
  callerOf,
  optionalAmount,
  optionalBoolean,
  optionalString,
  optionalTimestamp,
  parseDisbursement,
  parseIndex,
  queryString,
  readBody,
  requireAddress,
  requireAmount,
  requireString,
} from "./params";

export function salesRouter(desk: SaleDesk): Router {
  const router = Router();

  const view = (sale: Sale) => ({ ...sale, active: desk.isSaleActive(sale.index) });

  router.get("/sales", (_req, res) => {
    const sales = desk.listSales().map(view);
    res.json({ sales, count: sales.length });
  });

  router.get("/sales/:index", (req, res) => {
    res.json(view(desk.getSale(parseIndex(req.params.index))));
  });

  router.get("/sales/:index/quote", (req, res) => {
    const index = parseIndex(req.params.index);
    const amount = queryString(req.query.amount);
    const native = queryString(req.query.native);

    if (amount !== undefined) {
      const amountToBuy = requireAmount({ amount }, "amount");
      res.json({ index, amountToBuy, usdCost: desk.quoteStable(index, amountToBuy) });
      return;
    }
    if (native !== undefined) {
      const nativeSent = requireAmount({ native }, "native");
      res.json({ index, nativeSent, ...desk.quoteNative(index, nativeSent) });
      return;
    }
    throw new ValidationError("Pass either amount or native");
  });

  router.post("/sales", (req, res) => {
    const body = readBody(req);
    const index = desk.createSale(callerOf(req), {
      assetAddress: requireAddress(body, "assetAddress"),
      priceInUsd: requireAmount(body, "priceInUsd"),
      maxTokensToSell: optionalAmount(body, "maxTokensToSell") ?? 0n,
      startDate: optionalTimestamp(body, "startDate") ?? 0,
      endDate: optionalTimestamp(body, "endDate") ?? 0,
      paused: optionalBoolean(body, "paused") ?? false,
      disbursement: parseDisbursement(body.disbursement),
    });
    res.status(201).json(view(desk.getSale(index)));
  });

  router.patch("/sales/:index", (req, res) => {
    const index = parseIndex(req.params.index);
    const caller = callerOf(req);
    const body = readBody(req);
    const patch: SalePatch = {
      priceInUsd: optionalAmount(body, "priceInUsd"),
      maxTokensToSell: optionalAmount(body, "maxTokensToSell"),
      startDate: optionalTimestamp(body, "startDate"),
      endDate: optionalTimestamp(body, "endDate"),
      assetAddress: optionalString(body, "assetAddress"),
      paused: optionalBoolean(body, "paused"),
    };
    if (Object.values(patch).every((value) => value === undefined)) {
      throw new ValidationError("No updatable fields in request body");
    }

    const sale = desk.updateSale(caller, index, patch);
    res.json(view(sale));
  });

  router.post("/sales/:index/purchases", (req, res) => {
    const index = parseIndex(req.params.index);
    const buyer = callerOf(req);
    const body = readBody(req);
    const payment = requireString(body, "payment");
    const referralCode = optionalString(body, "referralCode") ?? "";

    let receipt: TokensBought;
    switch (payment) {
      case "A":
        receipt = desk.buyWithStablecoinA(buyer, index, requireAmount(body, "amount"), referralCode);
        break;
      case "B":
        receipt = desk.buyWithStablecoinB(buyer, index, requireAmount(body, "amount"), referralCode);
        break;
      case "native":
        receipt = desk.buyWithNative(buyer, index, requireAmount(body, "nativeSent"), referralCode);
        break;
      default:
        throw new ValidationError(`payment must be "A", "B" or "native"`);
    }
    res.status(201).json(receipt);
  });

  return router;
}
