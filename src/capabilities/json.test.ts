import { describe, it, expect } from "vitest";
import { z } from "zod";
import { extractJsonBlock, parseStructured } from "./json.js";
import { ExtractionError } from "../core/errors.js";

const Schema = z.object({ name: z.string(), count: z.number() });

describe("extractJsonBlock", () => {
  it("prefers a fenced block", () => {
    const text = 'Here you go:\n```json\n{"name": "Catan", "count": 2}\n```\nThanks {not this}';
    expect(extractJsonBlock(text)).toBe('{"name": "Catan", "count": 2}');
  });

  it("falls back to the outermost braces", () => {
    expect(extractJsonBlock('Result: {"a": {"b": 1}} done')).toBe('{"a": {"b": 1}}');
  });

  it("returns null without an object", () => {
    expect(extractJsonBlock("no json here")).toBeNull();
    expect(extractJsonBlock("} backwards {")).toBeNull();
  });
});

describe("parseStructured", () => {
  it("validates and returns the payload", () => {
    expect(parseStructured("test", 'ok {"name": "Azul", "count": 4}', Schema)).toEqual({ name: "Azul", count: 4 });
  });

  it("rejects text without JSON", () => {
    expect(() => parseStructured("test", "I could not find it", Schema)).toThrow(
      "Extraction failed for test: no JSON object in response"
    );
  });

  it("rejects malformed JSON", () => {
    expect(() => parseStructured("test", "{name: Azul}", Schema)).toThrow(
      "Extraction failed for test: response is not valid JSON"
    );
  });

  it("reports schema issues by path", () => {
    let caught: unknown;
    try {
      parseStructured("test", '{"name": "Azul", "count": "four"}', Schema);
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(ExtractionError);
    if (caught instanceof ExtractionError) {
      expect(caught.message).toBe("Extraction failed for test: response does not match schema");
      expect(caught.issues).toEqual(["count: Expected number, received string"]);
    }
  });
});
