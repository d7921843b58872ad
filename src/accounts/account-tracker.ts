/**
 * Account Tracker
 *
 * Balances and transaction history per sportsbook account. Lookups of an
 * unknown account return undefined instead of throwing, since callers
 * routinely probe for existence.
 */

import { randomUUID } from "node:crypto";
import { ValidationError } from "../errors/app.errors";
import type { BetResult } from "../risk/types";
import { ConsoleLogger, type Logger } from "../utils/logger.util";
import { round2 } from "../utils/math.util";

export const LOW_BALANCE_THRESHOLD = 10;

export type TransactionType = "deposit" | "withdrawal" | "bet_win" | "bet_loss" | "bet_void";

export type AccountTransaction = {
  readonly id: string;
  readonly accountId: string;
  readonly type: TransactionType;
  /** Always non-negative; direction follows from `type` */
  readonly amount: number;
  readonly description: string;
  readonly timestamp: Date;
};

export type SportsbookAccount = {
  readonly accountId: string;
  readonly name: string;
  balance: number;
  maxBet?: number;
  isLimited: boolean;
  isGubbed: boolean;
  readonly createdAt: Date;
  readonly transactions: AccountTransaction[];
};

export type AccountSummary = {
  name: string;
  accountId: string;
  balance: number;
  totalBetWinnings: number;
  totalBetLosses: number;
  netBettingPnl: number;
  isLimited: boolean;
  isGubbed: boolean;
  transactionCount: number;
};

export type AccountFlag = "limited" | "gubbed" | "low_balance";

export type AccountHealth = AccountSummary & { flags: AccountFlag[] };

const requirePositive = (amount: number, what: string): void => {
  if (!Number.isFinite(amount) || amount <= 0) {
    throw new ValidationError(`${what} amount must be positive, got ${amount}`, "amount", amount);
  }
};

export class AccountTracker {
  private readonly accounts: Map<string, SportsbookAccount> = new Map();
  private readonly logger: Logger;

  constructor(params: { logger?: Logger } = {}) {
    this.logger = params.logger ?? new ConsoleLogger();
  }

  addAccount(
    name: string,
    options: { initialBalance?: number; maxBet?: number; accountId?: string; now?: Date } = {},
  ): SportsbookAccount {
    const initialBalance = options.initialBalance ?? 0;
    if (!Number.isFinite(initialBalance) || initialBalance < 0) {
      throw new ValidationError(
        `Initial balance must be non-negative, got ${initialBalance}`,
        "initialBalance",
        initialBalance,
      );
    }
    const account: SportsbookAccount = {
      accountId: options.accountId ?? randomUUID(),
      name,
      balance: initialBalance,
      maxBet: options.maxBet,
      isLimited: false,
      isGubbed: false,
      createdAt: options.now ?? new Date(),
      transactions: [],
    };
    this.accounts.set(account.accountId, account);
    this.logger.info(
      `[ACCOUNTS] Added ${name} (id=${account.accountId}) balance=$${initialBalance.toFixed(2)}`,
    );
    return account;
  }

  getAccount(accountId: string): SportsbookAccount | undefined {
    return this.accounts.get(accountId);
  }

  getAccountByName(name: string): SportsbookAccount | undefined {
    const wanted = name.toLowerCase();
    return [...this.accounts.values()].find((account) => account.name.toLowerCase() === wanted);
  }

  listAccounts(): SportsbookAccount[] {
    return [...this.accounts.values()];
  }

  removeAccount(accountId: string): boolean {
    const removed = this.accounts.delete(accountId);
    if (removed) this.logger.info(`[ACCOUNTS] Removed id=${accountId}`);
    return removed;
  }

  deposit(accountId: string, amount: number, description = ""): AccountTransaction | undefined {
    requirePositive(amount, "Deposit");
    const account = this.accounts.get(accountId);
    if (!account) return this.unknown("deposit", accountId);
    account.balance += amount;
    return this.append(account, "deposit", amount, description);
  }

  withdraw(accountId: string, amount: number, description = ""): AccountTransaction | undefined {
    requirePositive(amount, "Withdrawal");
    const account = this.accounts.get(accountId);
    if (!account) return this.unknown("withdraw", accountId);
    if (amount > account.balance) {
      throw new ValidationError(
        `Insufficient balance on ${account.name}: requested ${amount.toFixed(2)}, have ${account.balance.toFixed(2)}`,
        "amount",
        amount,
      );
    }
    account.balance -= amount;
    return this.append(account, "withdrawal", amount, description);
  }

  applyBetResult(
    accountId: string,
    stake: number,
    price: number,
    result: BetResult,
  ): AccountTransaction | undefined {
    requirePositive(stake, "Stake");
    const account = this.accounts.get(accountId);
    if (!account) return this.unknown("applyBetResult", accountId);

    switch (result) {
      case "won": {
        const profit = stake * (price - 1);
        account.balance += profit;
        return this.append(account, "bet_win", profit, `Bet won: stake ${stake.toFixed(2)} @ ${price}`);
      }
      case "lost":
        account.balance -= stake;
        return this.append(account, "bet_loss", stake, `Bet lost: stake ${stake.toFixed(2)} @ ${price}`);
      case "void":
        return this.append(account, "bet_void", 0, `Bet voided: stake ${stake.toFixed(2)} @ ${price}`);
    }
  }

  totalBalance(): number {
    let total = 0;
    for (const account of this.accounts.values()) total += account.balance;
    return round2(total);
  }

  summary(accountId: string): AccountSummary | undefined {
    const account = this.accounts.get(accountId);
    return account ? this.summarize(account) : undefined;
  }

  accountSummaries(): AccountSummary[] {
    return this.listAccounts().map((account) => this.summarize(account));
  }

  /** Accounts needing attention: limited, gubbed, or below the low-balance threshold. */
  healthReport(): AccountHealth[] {
    const flagged: AccountHealth[] = [];
    for (const account of this.accounts.values()) {
      const flags: AccountFlag[] = [];
      if (account.isLimited) flags.push("limited");
      if (account.isGubbed) flags.push("gubbed");
      if (account.balance < LOW_BALANCE_THRESHOLD) flags.push("low_balance");
      if (flags.length > 0) flagged.push({ ...this.summarize(account), flags });
    }
    return flagged;
  }

  private summarize(account: SportsbookAccount): AccountSummary {
    const total = (type: TransactionType): number =>
      account.transactions.filter((txn) => txn.type === type).reduce((acc, txn) => acc + txn.amount, 0);
    const wins = total("bet_win");
    const losses = total("bet_loss");
    return {
      name: account.name,
      accountId: account.accountId,
      balance: round2(account.balance),
      totalBetWinnings: round2(wins),
      totalBetLosses: round2(losses),
      netBettingPnl: round2(wins - losses),
      isLimited: account.isLimited,
      isGubbed: account.isGubbed,
      transactionCount: account.transactions.length,
    };
  }

  private append(
    account: SportsbookAccount,
    type: TransactionType,
    amount: number,
    description: string,
  ): AccountTransaction {
    const txn: AccountTransaction = {
      id: randomUUID(),
      accountId: account.accountId,
      type,
      amount,
      description,
      timestamp: new Date(),
    };
    account.transactions.push(txn);
    this.logger.info(
      `[ACCOUNTS] ${account.name} ${type} $${amount.toFixed(2)} balance=$${account.balance.toFixed(2)}`,
    );
    return txn;
  }

  private unknown(operation: string, accountId: string): undefined {
    this.logger.warn(`[ACCOUNTS] ${operation}: unknown account id ${accountId}`);
    return undefined;
  }
}
