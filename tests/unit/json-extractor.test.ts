import { describe, it, expect, afterEach } from "vitest";
import { extractJsonFromResponse, JsonExtractionError } from "../../src/utils/json-extractor.js";
import { TelemetryEvents } from "../../src/utils/telemetry.js";
import { captureTelemetry } from "../helpers/telemetry.js";

describe("extractJsonFromResponse", () => {
  let telemetry: ReturnType<typeof captureTelemetry> | undefined;

  afterEach(() => {
    telemetry?.stop();
    telemetry = undefined;
  });

  it("parses clean JSON on the fast path without telemetry", () => {
    telemetry = captureTelemetry();
    const result = extractJsonFromResponse('  {"a": 1}\n');

    expect(result).toEqual({
      json: { a: 1 },
      wasExtracted: false,
      extractionMethod: "fast_path",
      preambleLength: 0,
      suffixLength: 0,
    });
    expect(telemetry.events).toEqual([]);
  });

  it("extracts from a fenced code block", () => {
    const result = extractJsonFromResponse('Here you go:\n```json\n{"a":1}\n```\nThanks');

    expect(result.json).toEqual({ a: 1 });
    expect(result.extractionMethod).toBe("code_block");
    expect(result.preambleLength).toBe(13);
    expect(result.suffixLength).toBe(7);
  });

  it("bracket-matches past braces inside strings", () => {
    const result = extractJsonFromResponse('Sure! {"a":{"b":"}"}} done');

    expect(result.json).toEqual({ a: { b: "}" } });
    expect(result.extractionMethod).toBe("bracket_matching");
    expect(result.preambleLength).toBe(6);
    expect(result.suffixLength).toBe(5);
  });

  it("strips trailing text after an object at the start", () => {
    const result = extractJsonFromResponse('{"a":1} trailing');

    expect(result.json).toEqual({ a: 1 });
    expect(result.preambleLength).toBe(0);
    expect(result.suffixLength).toBe(9);
  });

  it("skips brace groups in the preamble that are not JSON", () => {
    const result = extractJsonFromResponse('Use {name} then {"a":2}');

    expect(result.json).toEqual({ a: 2 });
    expect(result.preambleLength).toBe(16);
  });

  it("emits an extraction event when extraction was needed", () => {
    telemetry = captureTelemetry();
    extractJsonFromResponse('Sure! {"ok":true}', { contract: "sample", model: "m" });

    expect(telemetry.named(TelemetryEvents.JsonExtractionRequired)).toEqual([
      {
        name: "llm.json_extraction.required",
        data: {
          contract: "sample",
          model: "m",
          extraction_method: "bracket_matching",
          preamble_length: 6,
          suffix_length: 0,
        },
      },
    ]);
  });

  it("throws when there is no object at all", () => {
    expect(() => extractJsonFromResponse("no json here")).toThrow(
      new JsonExtractionError("No JSON object found in response: missing opening brace"),
    );
  });

  it("throws when no candidate parses", () => {
    expect(() => extractJsonFromResponse("{not json")).toThrow(
      "Failed to extract valid JSON object from response",
    );
  });
});
