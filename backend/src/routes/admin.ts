import { Router } from "express";
import type { SaleDesk } from "../../../sdk/core/src";
import { callerOf, optionalString, parseSlot, readBody, requireAddress, requireAmount } from "./params";

export function adminRouter(desk: SaleDesk): Router {
  const router = Router();

  router.get("/admin/config", (_req, res) => {
    res.json({
      desk: desk.address,
      owner: desk.owner,
      stablecoins: { A: desk.stablecoin("A"), B: desk.stablecoin("B") },
      priceFeed: desk.priceFeed,
      saleCount: desk.saleCount,
    });
  });

  router.put("/admin/stablecoins/:slot", (req, res) => {
    const slot = parseSlot(req.params.slot);
    const address = requireAddress(readBody(req), "address");
    desk.setStablecoin(callerOf(req), slot, address);
    res.json({ slot, address: desk.stablecoin(slot) });
  });

  router.put("/admin/price-feed", (req, res) => {
    desk.setPriceFeed(callerOf(req), requireAddress(readBody(req), "address"));
    res.json({ priceFeed: desk.priceFeed });
  });

  router.put("/admin/owner", (req, res) => {
    const previousOwner = desk.owner;
    desk.transferOwnership(callerOf(req), requireAddress(readBody(req), "address"));
    res.json({ previousOwner, owner: desk.owner });
  });

  /** `{ asset: "native" }` sweeps native currency; otherwise `{ token, amount }`. */
  router.post("/admin/withdrawals", (req, res) => {
    const caller = callerOf(req);
    const body = readBody(req);

    if (optionalString(body, "asset") === "native") {
      const amount = desk.withdrawNative(caller);
      res.json({ asset: "native", amount, to: desk.owner });
      return;
    }

    const token = requireAddress(body, "token");
    const amount = requireAmount(body, "amount");
    desk.withdrawForeignAsset(caller, token, amount);
    res.json({ asset: token, amount, to: desk.owner });
  });

  return router;
}
