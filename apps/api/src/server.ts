import { serve } from "@hono/node-server";
import {
  CryptoRandomnessCoordinator,
  RaffleKeeper,
  deployRaffle,
  initLogger,
  loadRaffleConfig,
} from "@charity-raffle/core";

import { createApp } from "./index";
import { createSeededLedger } from "./lib/ledger";

const jwtSecret = process.env.JWT_SECRET;
if (!jwtSecret) {
  throw new Error(
    "FATAL: Missing required environment variable JWT_SECRET. " +
      "Check your .env file or deployment configuration."
  );
}

const logger = initLogger({ serviceName: "charity-raffle-api" });
const config = loadRaffleConfig();
const ledger = createSeededLedger(config, process.env.LEDGER_BALANCES);

const engine = deployRaffle(config, {
  ledger,
  coordinator: new CryptoRandomnessCoordinator({ logger }),
  logger,
});

const keeper = new RaffleKeeper({
  engine,
  intervalSeconds: config.keepersUpdateIntervalSeconds,
  logger,
});

const app = createApp({ engine, jwtSecret, logger });
const port = Number(process.env.PORT ?? 3001);

const server = serve({ fetch: app.fetch, port }, (info) => {
  logger.info("Raffle API listening", { port: info.port, raffleId: config.raffleId });
});
keeper.start();

function shutdown(signal: string): void {
  logger.info("Shutting down", { signal });
  keeper.stop();
  server.close((error) => {
    if (error) {
      logger.error("Server close failed", { error });
      process.exitCode = 1;
    }
  });
}

process.on("SIGINT", () => shutdown("SIGINT"));
process.on("SIGTERM", () => shutdown("SIGTERM"));
