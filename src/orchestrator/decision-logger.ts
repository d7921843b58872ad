import { promises as fs } from "fs";
import path from "path";

export type DecisionAction = "bet" | "skip" | "dry_run";

export type DecisionLogEntry = {
  ts: string;
  candidate_id: string;
  sport: string;
  legs: number;
  price: number;
  ev: number;
  action: DecisionAction;
  reason?: string;
  stake?: number;
  broker?: string;
  confirmation_id?: string;
};

/** Appends one JSON object per line; a no-op without a path. */
export class DecisionLogger {
  private readonly path?: string;

  constructor(path?: string) {
    this.path = path || undefined;
  }

  isEnabled(): boolean {
    return this.path !== undefined;
  }

  async append(entry: DecisionLogEntry): Promise<void> {
    if (!this.path) return;
    const line = `${JSON.stringify(entry)}\n`;
    await fs.mkdir(path.dirname(this.path), { recursive: true });
    await fs.appendFile(this.path, line, { encoding: "utf8" });
  }
}
