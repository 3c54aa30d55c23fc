import { describe, expect, it } from "vitest";

import { rejected } from "../src/core/result.js";
import { SessionContext } from "../src/core/session/context.js";

describe("SessionContext", () => {
  it("tracks the current project", () => {
    const context = new SessionContext();
    expect(context.getCurrent()).toBeNull();
    context.setCurrent("demo");
    expect(context.getCurrent()).toBe("demo");
    context.setCurrent("other");
    expect(context.getCurrent()).toBe("other");
    context.clearCurrent();
    expect(context.getCurrent()).toBeNull();
  });

  it("appends history in order with timestamps from its clock", () => {
    let tick = 0;
    const context = new SessionContext(() => new Date(Date.UTC(2026, 9, 18, 12, 0, tick++)));

    context.appendHistory({ kind: "ListProjects", rawText: "list projects" }, rejected("NoActiveProject", "none"));
    context.appendHistory({ kind: "RunTests", rawText: "run tests" }, rejected("NoActiveProject", "none"));

    expect(context.startedAt).toBe("2026-10-18T12:00:00.000Z");
    expect(context.getHistory().map((entry) => [entry.at, entry.command.rawText])).toEqual([
      ["2026-10-18T12:00:01.000Z", "list projects"],
      ["2026-10-18T12:00:02.000Z", "run tests"]
    ]);
  });

  it("keeps sessions independent", () => {
    const first = new SessionContext();
    const second = new SessionContext();
    first.setCurrent("demo");
    first.appendHistory({ kind: "ListProjects", rawText: "list projects" }, rejected("InvalidArgument", "x"));
    expect(second.getCurrent()).toBeNull();
    expect(second.getHistory()).toHaveLength(0);
  });
});
