import { describe, expect, it } from "vitest";

import { renderPayload, renderResult, summarizeForSpeech } from "../src/core/render.js";
import { failed, ok, rejected } from "../src/core/result.js";

describe("renderResult", () => {
  it("prints rejections and failures with their reason", () => {
    expect(renderResult(rejected("NoActiveProject", "No project is loaded."))).toBe(
      "No project is loaded. [NoActiveProject]"
    );
    expect(
      renderResult(
        failed("CollaboratorError", "Tests failed: 0 passed, 1 failed.", {
          type: "test-run",
          project: "demo",
          report: { passed: 0, failed: 1, log: "FAILED tests/test_app.py::test_x" }
        })
      )
    ).toBe("Tests failed: 0 passed, 1 failed. [CollaboratorError]\nFAILED tests/test_app.py::test_x");
  });

  it("numbers file lines", () => {
    const lines = Array.from({ length: 10 }, (_, index) => `line ${index + 1}`).join("\n");
    const rendered = renderPayload({ type: "file", path: "src/a.py", content: `${lines}\n`, lines: 10 });
    expect(rendered[0]).toBe(" 1 | line 1");
    expect(rendered[9]).toBe("10 | line 10");
    expect(rendered).toHaveLength(10);
    expect(renderPayload({ type: "file", path: "src/a.py", content: "", lines: 0 })).toEqual(["(empty file)"]);
  });

  it("shows how to undo a delete", () => {
    expect(
      renderResult(
        ok('Deleted project "demo" (backup 20261018T150812345Z).', {
          type: "deleted",
          project: "demo",
          backup: { sourceProjectName: "demo", timestamp: "20261018T150812345Z", reason: "pre-delete", fileCount: 2 }
        })
      )
    ).toBe(
      'Deleted project "demo" (backup 20261018T150812345Z).\nRestore with: restore project demo from 20261018T150812345Z'
    );
  });

  it("lists backups and deployment locations", () => {
    expect(
      renderPayload({
        type: "backups",
        backups: [{ sourceProjectName: "demo", timestamp: "20261018T150812345Z", reason: "manual", fileCount: 3 }]
      })
    ).toEqual(["- demo @ 20261018T150812345Z (manual, 3 file(s))"]);
    expect(
      renderPayload({
        type: "deployment",
        project: "demo",
        environment: "staging",
        report: { success: true, log: "", location: "/srv/demo" }
      })
    ).toEqual(["Location: /srv/demo"]);
  });

  it("keeps the tail of long logs", () => {
    const log = `${"a".repeat(10)}${"b".repeat(4_000)}`;
    const [rendered] = renderPayload({ type: "test-run", project: "demo", report: { passed: 1, failed: 0, log } });
    expect(rendered).toBe(`...${"b".repeat(4_000)}`);
  });

  it("shortens messages for speech", () => {
    expect(summarizeForSpeech(rejected("InvalidArgument", "x".repeat(250)))).toBe(`${"x".repeat(197)}...`);
  });
});
