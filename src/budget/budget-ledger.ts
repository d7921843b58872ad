/**
 * Budget Ledger
 *
 * Append-only spend log checked against per-period limits. A period may carry
 * per-category sub-limits (matched case-insensitively); categories without one
 * are held to the period's global limit. Either way a category is measured
 * against its own spend. With no period configured the ledger is unbudgeted
 * and every spend is allowed.
 */

import { ValidationError } from "../errors/app.errors";
import { ConsoleLogger, type Logger } from "../utils/logger.util";
import { round2, roundTo } from "../utils/math.util";
import {
  BUDGET_PERIODS,
  isWithin,
  periodBounds,
  type BudgetPeriod,
} from "./period";

export type Budget = {
  readonly period: BudgetPeriod;
  readonly limit: number;
  readonly categoryLimits: Readonly<Record<string, number>>;
};

export type BudgetEntry = {
  readonly refId: string;
  readonly amount: number;
  readonly category: string;
  /** Sportsbook or other origin of the spend */
  readonly source: string;
  readonly timestamp: Date;
};

export type PeriodSummary = {
  limit: number;
  spent: number;
  remaining: number;
  utilisationPct: number;
  periodStart: string;
  periodEnd: string;
  categoryLimits: Record<string, number>;
};

export type BudgetSummary = Partial<Record<BudgetPeriod, PeriodSummary>>;

const sameCategory = (a: string, b: string): boolean => a.toUpperCase() === b.toUpperCase();

const requireValidDate = (value: Date, field: string): void => {
  if (Number.isNaN(value.getTime())) {
    throw new ValidationError(`${field} must be a valid date`, field, value);
  }
};

export class BudgetLedger {
  private readonly budgets: Map<BudgetPeriod, Budget> = new Map();
  private readonly log: BudgetEntry[] = [];
  private readonly logger: Logger;

  constructor(params: { logger?: Logger } = {}) {
    this.logger = params.logger ?? new ConsoleLogger();
  }

  /** Replaces any existing configuration for `period`. */
  configure(
    period: BudgetPeriod,
    limit: number,
    categoryLimits: Record<string, number> = {},
  ): Budget {
    if (!Number.isFinite(limit) || limit <= 0) {
      throw new ValidationError(`Budget limit must be positive, got ${limit}`, "limit", limit);
    }
    for (const [category, value] of Object.entries(categoryLimits)) {
      if (!Number.isFinite(value) || value <= 0) {
        throw new ValidationError(
          `Category limit for ${category} must be positive, got ${value}`,
          "categoryLimits",
          value,
        );
      }
    }
    const budget: Budget = Object.freeze({
      period,
      limit,
      categoryLimits: Object.freeze({ ...categoryLimits }),
    });
    this.budgets.set(period, budget);
    this.logger.info(
      `[BUDGET] ${period} limit=$${limit.toFixed(2)} category_limits=${JSON.stringify(categoryLimits)}`,
    );
    return budget;
  }

  getBudget(period: BudgetPeriod): Budget | undefined {
    return this.budgets.get(period);
  }

  isBudgeted(): boolean {
    return this.budgets.size > 0;
  }

  recordSpend(
    refId: string,
    amount: number,
    category = "unknown",
    source = "unknown",
    timestamp: Date = new Date(),
  ): BudgetEntry {
    if (!Number.isFinite(amount) || amount <= 0) {
      throw new ValidationError(`Spend amount must be positive, got ${amount}`, "amount", amount);
    }
    requireValidDate(timestamp, "timestamp");
    const entry: BudgetEntry = Object.freeze({ refId, amount, category, source, timestamp });
    this.log.push(entry);
    this.logger.info(
      `[BUDGET] Spend recorded ref=${refId} amount=$${amount.toFixed(2)} category=${category} source=${source}`,
    );
    return entry;
  }

  entries(): readonly BudgetEntry[] {
    return [...this.log];
  }

  spentInPeriod(period: BudgetPeriod, category?: string, referenceDate: Date = new Date()): number {
    requireValidDate(referenceDate, "referenceDate");
    if (!this.budgets.has(period)) return 0;
    const bounds = periodBounds(period, referenceDate);
    let total = 0;
    for (const entry of this.log) {
      if (!isWithin(bounds, entry.timestamp)) continue;
      if (category !== undefined && !sameCategory(entry.category, category)) continue;
      total += entry.amount;
    }
    return round2(total);
  }

  /** Category sub-limit for `category`, if the budget defines one. */
  categoryLimit(budget: Budget, category?: string): number | undefined {
    if (category === undefined) return undefined;
    const match = Object.keys(budget.categoryLimits).find((key) => sameCategory(key, category));
    return match === undefined ? undefined : budget.categoryLimits[match];
  }

  /**
   * Applicable limit (the category's sub-limit, else the global one) minus
   * the category's spend; all spend when no category is given. Never
   * negative; Infinity when `period` is not configured.
   */
  remaining(period: BudgetPeriod, category?: string, referenceDate: Date = new Date()): number {
    requireValidDate(referenceDate, "referenceDate");
    const budget = this.budgets.get(period);
    if (!budget) return Number.POSITIVE_INFINITY;
    const limit = this.categoryLimit(budget, category) ?? budget.limit;
    const left = limit - this.spentInPeriod(period, category, referenceDate);
    return round2(Math.max(0, left));
  }

  /** True when nothing is configured; otherwise `amount` must fit `remaining` in every configured period. */
  canSpend(amount: number, category?: string, referenceDate: Date = new Date()): boolean {
    if (!Number.isFinite(amount) || amount <= 0) {
      throw new ValidationError(`Spend amount must be positive, got ${amount}`, "amount", amount);
    }
    requireValidDate(referenceDate, "referenceDate");
    if (this.budgets.size === 0) return true;
    for (const period of this.budgets.keys()) {
      const left = this.remaining(period, category, referenceDate);
      if (amount > left) {
        this.logger.warn(
          `[BUDGET] Breach: ${period} remaining=$${left.toFixed(2)} requested=$${amount.toFixed(2)} category=${category ?? "any"}`,
        );
        return false;
      }
    }
    return true;
  }

  summary(referenceDate: Date = new Date()): BudgetSummary {
    requireValidDate(referenceDate, "referenceDate");
    const result: BudgetSummary = {};
    for (const period of BUDGET_PERIODS) {
      const budget = this.budgets.get(period);
      if (!budget) continue;
      const spent = this.spentInPeriod(period, undefined, referenceDate);
      const bounds = periodBounds(period, referenceDate);
      result[period] = {
        limit: budget.limit,
        spent,
        remaining: round2(Math.max(0, budget.limit - spent)),
        utilisationPct: roundTo((spent / budget.limit) * 100, 1),
        periodStart: bounds.start,
        periodEnd: bounds.end,
        categoryLimits: { ...budget.categoryLimits },
      };
    }
    return result;
  }
}
