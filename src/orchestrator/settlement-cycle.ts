import type { AccountTracker } from "../accounts/account-tracker";
import { MarketError } from "../errors/app.errors";
import type { BrokerRouter } from "../market/broker-router";
import type { OrderPoll } from "../market/types";
import type { RiskGate } from "../risk/risk-gate";
import type { BetResult } from "../risk/types";
import type { Logger } from "../utils/logger.util";

export type SettledBet = {
  betId: string;
  confirmationId: string;
  brokerName: string;
  result: BetResult;
  pnl: number;
};

export type SettlementReport = {
  polled: number;
  settled: SettledBet[];
  stillPending: number;
  unknown: number;
  failures: number;
};

/** Polls brokers for every pending bet and books the ones that have settled. */
export class SettlementCycle {
  private readonly riskGate: RiskGate;
  private readonly router: BrokerRouter;
  private readonly accounts?: AccountTracker;
  private readonly logger: Logger;

  constructor(params: { riskGate: RiskGate; router: BrokerRouter; accounts?: AccountTracker; logger: Logger }) {
    this.riskGate = params.riskGate;
    this.router = params.router;
    this.accounts = params.accounts;
    this.logger = params.logger;
  }

  async runOnce(now: Date = new Date()): Promise<SettlementReport> {
    const report: SettlementReport = { polled: 0, settled: [], stillPending: 0, unknown: 0, failures: 0 };

    for (const bet of this.riskGate.getPendingBets()) {
      const market = this.router.getMarket(bet.brokerName);
      if (!market) {
        this.logger.warn(`[SETTLE] No market registered for ${bet.brokerName}; bet ${bet.id} left pending`);
        report.failures += 1;
        continue;
      }

      report.polled += 1;
      let poll: OrderPoll;
      try {
        poll = await market.pollOrder(bet.confirmationId);
      } catch (err) {
        if (!(err instanceof MarketError)) throw err;
        this.logger.warn(`[SETTLE] Poll failed for ${bet.confirmationId} on ${market.name}: ${err.message}`);
        report.failures += 1;
        continue;
      }

      if (poll.status === "pending") {
        report.stillPending += 1;
        continue;
      }
      if (poll.status === "unknown" || poll.result === undefined) {
        this.logger.warn(`[SETTLE] ${market.name} does not know order ${bet.confirmationId}`);
        report.unknown += 1;
        continue;
      }

      const outcome = this.riskGate.settleBet(bet.id, poll.result, now);
      if (!outcome.ok) continue;

      report.settled.push({
        betId: bet.id,
        confirmationId: bet.confirmationId,
        brokerName: bet.brokerName,
        result: poll.result,
        pnl: outcome.pnl,
      });

      const account = this.accounts?.getAccountByName(bet.brokerName);
      if (account) {
        this.accounts?.applyBetResult(account.accountId, bet.stake, bet.price, poll.result);
      }
    }

    if (report.polled > 0) {
      this.logger.info(
        `[SETTLE] polled=${report.polled} settled=${report.settled.length} pending=${report.stillPending} unknown=${report.unknown} failures=${report.failures}`,
      );
    }
    return report;
  }
}
