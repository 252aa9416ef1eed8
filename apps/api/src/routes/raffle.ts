import { Hono } from "hono";
import { zValidator } from "@hono/zod-validator";
import { z } from "zod";
import { CHARITY_CHOICES } from "@charity-raffle/core";
import type { Env } from "../index";
import { requireCaller } from "../middleware/auth";
import { amountSchema, validationHook } from "../utils/validation";

const app = new Hono<Env>();

const enterSchema = z.object({
  fee: amountSchema,
  charity: z.enum(CHARITY_CHOICES),
});

/**
 * Current raffle summary
 */
app.get("/", (c) => {
  return c.json({
    success: true,
    data: c.get("engine").getSummary(),
    timestamp: new Date().toISOString(),
  });
});

/**
 * Entrants of the open cycle, in entry order
 */
app.get("/entrants", (c) => {
  const entrants = c.get("engine").getEntrants();
  return c.json({
    success: true,
    data: { entrants, count: entrants.length },
    timestamp: new Date().toISOString(),
  });
});

/**
 * Whether the cycle is ready to close
 */
app.get("/upkeep", (c) => {
  return c.json({
    success: true,
    data: c.get("engine").checkUpkeep(),
    timestamp: new Date().toISOString(),
  });
});

/**
 * Buy a ticket for the calling account
 */
app.post("/enter", requireCaller, zValidator("json", enterSchema, validationHook), (c) => {
  const { fee, charity } = c.req.valid("json");
  const entrant = c.get("callerId") ?? "";
  const entry = c.get("engine").enter(fee, charity, entrant);

  return c.json(
    {
      success: true,
      data: {
        entrant: entry.entrant,
        charity: entry.charity,
        fee: entry.fee.toString(),
      },
      timestamp: new Date().toISOString(),
    },
    201
  );
});

/**
 * Close the cycle and request randomness
 */
app.post("/upkeep", requireCaller, (c) => {
  const requestId = c.get("engine").performUpkeep();

  return c.json(
    {
      success: true,
      data: { requestId: requestId.toString() },
      timestamp: new Date().toISOString(),
    },
    202
  );
});

export { app as raffleRoutes };
