import { describe, it, expect } from "vitest";
import { canTransition, entityNameKey, normalizeEntityName, type EntityStatus } from "./entity.js";
import { parsePlayerCount } from "./extraction.js";

describe("canTransition", () => {
  const allowed: Array<[EntityStatus, EntityStatus]> = [
    ["created", "researching"],
    ["created", "failed"],
    ["researching", "ready"],
    ["researching", "failed"],
    ["ready", "researching"],
    ["failed", "researching"],
  ];

  it.each(allowed)("allows %s -> %s", (from, to) => {
    expect(canTransition(from, to)).toBe(true);
  });

  const rejected: Array<[EntityStatus, EntityStatus]> = [
    ["created", "ready"],
    ["researching", "created"],
    ["researching", "researching"],
    ["ready", "failed"],
    ["ready", "created"],
    ["failed", "ready"],
  ];

  it.each(rejected)("rejects %s -> %s", (from, to) => {
    expect(canTransition(from, to)).toBe(false);
  });
});

describe("entity names", () => {
  it("trims and collapses whitespace", () => {
    expect(normalizeEntityName("  Ticket   to\tRide ")).toBe("Ticket to Ride");
  });

  it("keys names case-insensitively", () => {
    expect(entityNameKey("  CATAN ")).toBe("catan");
    expect(entityNameKey("Ticket to  Ride")).toBe(entityNameKey("ticket to ride"));
  });
});

describe("parsePlayerCount", () => {
  it("parses ranges", () => {
    expect(parsePlayerCount("2-4")).toEqual({ min: 2, max: 4 });
    expect(parsePlayerCount("1 – 5")).toEqual({ min: 1, max: 5 });
    expect(parsePlayerCount("2 to 6 players")).toEqual({ min: 2, max: 6 });
  });

  it("parses a single count", () => {
    expect(parsePlayerCount("4")).toEqual({ min: 4, max: 4 });
    expect(parsePlayerCount("2 players")).toEqual({ min: 2, max: 2 });
  });

  it("rejects empty and inverted values", () => {
    expect(parsePlayerCount(null)).toBeNull();
    expect(parsePlayerCount("")).toBeNull();
    expect(parsePlayerCount("5-2")).toBeNull();
    expect(parsePlayerCount("unknown")).toBeNull();
    expect(parsePlayerCount("0")).toBeNull();
  });
});
