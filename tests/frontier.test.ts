import { describe, expect, test } from "vitest";
import { Frontier } from "../src/frontier";

describe("Frontier", () => {
  test("pops in insertion order", () => {
    const frontier = new Frontier(2);
    frontier.push("https://example.com/", 0);
    frontier.push("https://example.com/a", 1);
    frontier.push("https://example.com/b", 1);

    expect(frontier.pop()).toEqual({ url: "https://example.com/", depth: 0 });
    expect(frontier.pop()).toEqual({ url: "https://example.com/a", depth: 1 });
    expect(frontier.pendingCount).toBe(1);
  });

  test("rejects tasks beyond the depth limit", () => {
    const frontier = new Frontier(1);
    expect(frontier.push("https://example.com/deep", 2)).toBe(false);
    expect(frontier.pendingCount).toBe(0);
  });

  test("rejects visited URLs and marks each URL only once", () => {
    const frontier = new Frontier(2);
    expect(frontier.markVisited("https://example.com/")).toBe(true);
    expect(frontier.markVisited("https://example.com/")).toBe(false);
    expect(frontier.push("https://example.com/", 1)).toBe(false);
    expect(frontier.isVisited("https://example.com/")).toBe(true);
    expect(frontier.visitedCount).toBe(1);
  });

  test("clear drops pending work but keeps the visited set", () => {
    const frontier = new Frontier(2);
    frontier.markVisited("https://example.com/");
    frontier.push("https://example.com/a", 1);
    frontier.push("https://example.com/b", 1);

    expect(frontier.clear()).toBe(2);
    expect(frontier.pop()).toBeUndefined();
    expect(frontier.isVisited("https://example.com/")).toBe(true);
  });

  test("keeps order across queue compaction", () => {
    const frontier = new Frontier(1);
    for (let index = 0; index < 3000; index += 1) {
      frontier.push(`https://example.com/p${index}`, 1);
    }
    for (let index = 0; index < 2000; index += 1) {
      frontier.pop();
    }
    expect(frontier.pop()?.url).toBe("https://example.com/p2000");
    expect(frontier.pendingCount).toBe(999);
  });
});
