import { Hono } from "hono";
import type { Env } from "../index";
import { requireCaller } from "../middleware/auth";

const app = new Hono<Env>();

app.use("*", requireCaller);

/**
 * Escrow the donation match. Funder only, while the raffle is open.
 */
app.post("/fund", (c) => {
  const amount = c.get("engine").fundDonationMatch(c.get("callerId") ?? "");

  return c.json({
    success: true,
    data: { amount: amount.toString() },
    timestamp: new Date().toISOString(),
  });
});

/**
 * Pay the escrowed match to the winning charity
 */
app.post("/release", (c) => {
  const release = c.get("engine").releaseDonationMatch(c.get("callerId") ?? "");

  return c.json({
    success: true,
    data: { charity: release.charity, amount: release.amount.toString() },
    timestamp: new Date().toISOString(),
  });
});

export { app as escrowRoutes };
