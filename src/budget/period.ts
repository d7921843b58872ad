/**
 * Budget period boundaries.
 *
 * Calendar dates are UTC dates rendered as YYYY-MM-DD, so boundaries do not
 * move with the host's timezone.
 * - daily: the reference date
 * - weekly: Monday..Sunday containing the reference date
 * - monthly: first..last day of the reference date's month
 */

export type BudgetPeriod = "daily" | "weekly" | "monthly";

export const BUDGET_PERIODS: readonly BudgetPeriod[] = ["daily", "weekly", "monthly"];

export type PeriodBounds = {
  /** Inclusive, YYYY-MM-DD */
  start: string;
  /** Inclusive, YYYY-MM-DD */
  end: string;
};

const DAY_MS = 24 * 60 * 60 * 1000;

export function isBudgetPeriod(value: string): value is BudgetPeriod {
  return BUDGET_PERIODS.some((period) => period === value);
}

export function toUtcDateKey(date: Date): string {
  return date.toISOString().slice(0, 10);
}

function utcMidnight(date: Date): Date {
  return new Date(Date.UTC(date.getUTCFullYear(), date.getUTCMonth(), date.getUTCDate()));
}

export function periodStart(period: BudgetPeriod, reference: Date): Date {
  const day = utcMidnight(reference);
  switch (period) {
    case "daily":
      return day;
    case "weekly": {
      // getUTCDay: Sunday = 0, so Monday-based weekday is (day + 6) % 7
      const weekday = (day.getUTCDay() + 6) % 7;
      return new Date(day.getTime() - weekday * DAY_MS);
    }
    case "monthly":
      return new Date(Date.UTC(day.getUTCFullYear(), day.getUTCMonth(), 1));
  }
}

export function periodEnd(period: BudgetPeriod, reference: Date): Date {
  const start = periodStart(period, reference);
  switch (period) {
    case "daily":
      return start;
    case "weekly":
      return new Date(start.getTime() + 6 * DAY_MS);
    case "monthly":
      // day 0 of the next month is the last day of this one
      return new Date(Date.UTC(start.getUTCFullYear(), start.getUTCMonth() + 1, 0));
  }
}

export function periodBounds(period: BudgetPeriod, reference: Date): PeriodBounds {
  return {
    start: toUtcDateKey(periodStart(period, reference)),
    end: toUtcDateKey(periodEnd(period, reference)),
  };
}

export function isWithin(bounds: PeriodBounds, timestamp: Date): boolean {
  const key = toUtcDateKey(timestamp);
  return key >= bounds.start && key <= bounds.end;
}
