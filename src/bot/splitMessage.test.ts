import { describe, expect, it } from "vitest";
import { splitMessage } from "./splitMessage";

describe("splitMessage", () => {
  it("returns short messages untouched", () => {
    expect(splitMessage("hello")).toEqual(["hello"]);
  });

  it("splits on paragraph boundaries", () => {
    expect(splitMessage("aaaa\n\nbbbb\n\ncccc", 10)).toEqual(["aaaa\n\nbbbb", "cccc"]);
  });

  it("splits an oversized paragraph on line boundaries", () => {
    expect(splitMessage("• one\n• two\n• three", 12)).toEqual(["• one\n• two", "• three"]);
  });

  it("cuts a single overlong line as a last resort", () => {
    expect(splitMessage("abcdefghij", 4)).toEqual(["abcd", "efgh", "ij"]);
  });

  it("does not cut an emoji in half when a cut lands inside it", () => {
    expect(splitMessage("ab😀cd", 3)).toEqual(["ab", "😀c", "d"]);
  });

  it("keeps every part within the default limit", () => {
    const paragraph = "x".repeat(1_500);
    const parts = splitMessage([paragraph, paragraph, paragraph].join("\n\n"));

    expect(parts).toHaveLength(2);
    expect(parts.every((part) => part.length <= 4_000)).toBe(true);
    expect(parts.join("\n\n")).toBe([paragraph, paragraph, paragraph].join("\n\n"));
  });
});
