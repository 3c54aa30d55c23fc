import { describe, expect, it } from "vitest";

import { stripWakePhrase } from "../src/core/intent/wake-phrase.js";

describe("stripWakePhrase", () => {
  it("only strips a leading phrase in text mode", () => {
    expect(stripWakePhrase("hey assistant list projects", "hey assistant", "text")).toEqual({
      found: true,
      remainder: "list projects"
    });
    expect(stripWakePhrase("list projects hey assistant", "hey assistant", "text")).toEqual({
      found: false,
      remainder: "list projects hey assistant"
    });
  });

  it("finds the phrase anywhere in voice mode", () => {
    expect(stripWakePhrase("okay so, Hey, Assistant: run tests", "hey assistant", "voice")).toEqual({
      found: true,
      remainder: "run tests"
    });
  });

  it("requires whole words", () => {
    expect(stripWakePhrase("they assistant run tests", "hey assistant", "voice").found).toBe(false);
    expect(stripWakePhrase("hey assistants run tests", "hey assistant", "voice").found).toBe(false);
  });

  it("treats an empty phrase as always present", () => {
    expect(stripWakePhrase("  deploy  ", "   ", "voice")).toEqual({ found: true, remainder: "deploy" });
  });
});
