/**
 * format-results.test.ts - Unit tests for result formatting
 */

import { describe, it, expect } from "vitest";
import { describeSimilarity, formatQueryResults } from "./format-results";

describe("formatQueryResults", () => {
  it("says so when nothing matched", () => {
    expect(formatQueryResults([], "docs")).toBe('No results found in "docs".');
  });

  it("numbers results and lists metadata without the text", () => {
    const output = formatQueryResults(
      [
        {
          id: "a",
          score: 0.912,
          text: "A cat sleeps",
          payload: { text: "A cat sleeps", category: "pets", tags: ["cat"] },
        },
        { id: "b", score: 0.1, text: "A dog barks", payload: { text: "A dog barks" } },
      ],
      "docs"
    );

    expect(output).toBe(
      [
        'Found 2 results in "docs":',
        "",
        "1. a (score: 0.91, very similar)",
        "   A cat sleeps",
        '   Metadata: category=pets, tags=["cat"]',
        "",
        "2. b (score: 0.10, weak match)",
        "   A dog barks",
      ].join("\n")
    );
  });

  it("leaves out a payload id that repeats the record id", () => {
    const output = formatQueryResults(
      [
        { id: "a", score: 0.9, text: "foo", payload: { text: "foo", id: "a", category: "x" } },
        { id: "b", score: 0.9, text: "bar", payload: { text: "bar", id: "external-3" } },
      ],
      "docs"
    );

    expect(output.split("\n")).toContain("   Metadata: category=x");
    expect(output.split("\n")).toContain("   Metadata: id=external-3");
  });

  it("uses the singular for one result", () => {
    const output = formatQueryResults(
      [{ id: "a", score: 1, text: "foo", payload: { text: "foo" } }],
      "docs"
    );

    expect(output.split("\n")[0]).toBe('Found 1 result in "docs":');
  });
});

describe("describeSimilarity", () => {
  it.each([
    [1, "very similar"],
    [0.8, "very similar"],
    [0.6, "similar"],
    [0.3, "somewhat related"],
    [0.05, "weak match"],
    [-0.5, "weak match"],
  ])("labels %s as %s", (score, label) => {
    expect(describeSimilarity(score)).toBe(label);
  });
});
