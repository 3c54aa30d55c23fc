import { describe, expect, it } from "vitest";

import { extractFileContent } from "../src/core/ai-parsing.js";

describe("extractFileContent", () => {
  it("reads a claude result string holding fenced JSON", () => {
    const raw = JSON.stringify({
      type: "result",
      subtype: "success",
      result: "```json\n{\"content\":\"print('hi')\\n\",\"summary\":\"greets\"}\n```"
    });

    expect(extractFileContent(raw)).toEqual({ content: "print('hi')\n", summary: "greets" });
  });

  it("reads the claude structured_output envelope", () => {
    const raw = JSON.stringify({
      type: "result",
      structured_output: { content: "x = 1\n" }
    });

    expect(extractFileContent(raw)).toEqual({ content: "x = 1\n" });
  });

  it("reads the trailing JSON object of a codex transcript", () => {
    const raw = [
      "user",
      "Edit src/app.py",
      "thinking",
      "**Rewriting the function**",
      "codex",
      "{\"content\":\"def main():\\n    return 0\\n\"}",
      "tokens used",
      "2048"
    ].join("\n");

    expect(extractFileContent(raw)).toEqual({ content: "def main():\n    return 0\n" });
  });

  it("accepts empty file content", () => {
    expect(extractFileContent("{\"content\":\"\"}")).toEqual({ content: "" });
  });

  it("returns null when no reply carries content", () => {
    expect(extractFileContent("{\"text\":\"nope\"}")).toBeNull();
    expect(extractFileContent("plain words")).toBeNull();
    expect(extractFileContent("")).toBeNull();
  });
});
