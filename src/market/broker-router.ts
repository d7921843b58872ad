/**
 * Sport -> broker routing. Routes are data, so adding a book for a sport is
 * a configuration change.
 */

import { ConfigurationError } from "../errors/app.errors";
import type { Market } from "./types";

export class BrokerRouter {
  private readonly markets: Map<string, Market> = new Map();
  private readonly routes: Map<string, string>;
  private readonly defaultBroker: string;

  constructor(params: {
    markets: readonly Market[];
    routes?: Readonly<Record<string, string>>;
    defaultBroker: string;
  }) {
    for (const market of params.markets) {
      if (this.markets.has(market.name)) {
        throw new ConfigurationError(`Duplicate broker name: ${market.name}`, "markets");
      }
      this.markets.set(market.name, market);
    }
    this.routes = new Map(
      Object.entries(params.routes ?? {}).map(([sport, broker]) => [sport.toUpperCase(), broker]),
    );
    this.defaultBroker = params.defaultBroker;

    for (const broker of [this.defaultBroker, ...this.routes.values()]) {
      if (!this.markets.has(broker)) {
        throw new ConfigurationError(`No market registered for broker "${broker}"`, "BROKER_ROUTES");
      }
    }
  }

  brokerFor(sport: string): string {
    return this.routes.get(sport.toUpperCase()) ?? this.defaultBroker;
  }

  marketFor(sport: string): Market {
    return this.require(this.brokerFor(sport));
  }

  /** Undefined for a broker name nothing is registered under. */
  getMarket(name: string): Market | undefined {
    return this.markets.get(name);
  }

  brokerNames(): string[] {
    return [...this.markets.keys()];
  }

  private require(name: string): Market {
    const market = this.markets.get(name);
    if (!market) {
      throw new ConfigurationError(`No market registered for broker "${name}"`, "BROKER_ROUTES");
    }
    return market;
  }
}
