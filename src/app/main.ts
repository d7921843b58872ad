#!/usr/bin/env node
import "dotenv/config";
import { formatConfigSummary, loadConfig, parseCliOverrides } from "../config/loadConfig";
import { ConfigurationError, toError } from "../errors/app.errors";
import { PaperMarket } from "../market/paper-market";
import type { PoolLeg } from "../parlay/types";
import { ConsoleLogger } from "../utils/logger.util";
import { createEngine, createMarkets } from "./engine";
import { loadLegPool, pricesFromPool } from "./leg-pool";

async function main(): Promise<void> {
  const logger = new ConsoleLogger({ includeTimestamp: true });
  const cliOverrides = parseCliOverrides(process.argv.slice(2));
  const config = loadConfig(cliOverrides);

  const overridesInfo = config.overridesApplied.length ? ` overrides=${config.overridesApplied.join(",")}` : "";
  logger.info(`[APP] ${formatConfigSummary(config)}${overridesInfo}`);

  const legPoolFile = config.legPoolFile;
  if (!legPoolFile) {
    throw new ConfigurationError("LEG_POOL_FILE must point at a JSON leg pool", "LEG_POOL_FILE");
  }
  const initialPool = await loadLegPool(legPoolFile);
  logger.info(`[APP] Loaded ${initialPool.length} legs from ${legPoolFile}`);

  const markets = createMarkets(config, logger, pricesFromPool(initialPool));
  const legSource = async (): Promise<PoolLeg[]> => {
    const legs = await loadLegPool(legPoolFile);
    for (const market of markets) {
      if (market instanceof PaperMarket) market.setPrices(pricesFromPool(legs));
    }
    return legs;
  };
  const engine = createEngine({ config, logger, legSource, markets });

  const shutdown = (signal: string): void => {
    logger.info(`[APP] ${signal} received; stopping`);
    engine.runtime.stop();
  };
  process.on("SIGINT", () => shutdown("SIGINT"));
  process.on("SIGTERM", () => shutdown("SIGTERM"));

  if (cliOverrides.ONCE === "true") {
    await engine.runtime.decide();
    await engine.runtime.settle();
    return;
  }
  engine.runtime.start();
}

main().catch((err) => {
  new ConsoleLogger().error("[APP] Fatal error", toError(err));
  process.exit(1);
});
