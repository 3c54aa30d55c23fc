import type { Command, Result, ResultPayload } from "../types.js";

export interface HistoryEntry {
  at: string;
  command: Command;
  result: Result<ResultPayload>;
}

/**
 * State for one command session: which project is current and what has been
 * dispatched so far. Each session owns its own instance.
 */
export class SessionContext {
  private currentProject: string | null = null;
  private readonly history: HistoryEntry[] = [];
  readonly startedAt: string;

  constructor(private readonly now: () => Date = () => new Date()) {
    this.startedAt = this.now().toISOString();
  }

  setCurrent(projectName: string): void {
    this.currentProject = projectName;
  }

  getCurrent(): string | null {
    return this.currentProject;
  }

  clearCurrent(): void {
    this.currentProject = null;
  }

  appendHistory(command: Command, result: Result<ResultPayload>): HistoryEntry {
    const entry: HistoryEntry = { at: this.now().toISOString(), command, result };
    this.history.push(entry);
    return entry;
  }

  getHistory(): readonly HistoryEntry[] {
    return this.history;
  }
}
