/**
 * JSON Extractor Utility
 *
 * Recovers the JSON object from provider output that carries a conversational
 * preamble, trailing text or markdown fences despite the contract instructions.
 */

import { log, emit, TelemetryEvents } from "./telemetry.js";

export type ExtractionMethod = "fast_path" | "code_block" | "bracket_matching";

export interface JsonExtractionResult {
  json: unknown;
  /** True when the raw content was not valid JSON on its own */
  wasExtracted: boolean;
  extractionMethod: ExtractionMethod;
  preambleLength: number;
  suffixLength: number;
}

export interface JsonExtractionOptions {
  /** Contract name for telemetry */
  contract?: string;
  model?: string;
  requestId?: string;
}

export class JsonExtractionError extends Error {
  readonly name = "JsonExtractionError";
}

/**
 * Extract the first JSON object from provider output.
 *
 * Order: the whole trimmed content, then each fenced code block, then a
 * bracket-matched object starting at each `{`.
 *
 * @throws JsonExtractionError when no JSON object can be recovered
 */
export function extractJsonFromResponse(
  content: string,
  options: JsonExtractionOptions = {},
): JsonExtractionResult {
  const trimmed = content.trim();

  if (trimmed.startsWith("{")) {
    const parsed = tryParse(trimmed);
    if (parsed.ok) {
      return { json: parsed.value, wasExtracted: false, extractionMethod: "fast_path", preambleLength: 0, suffixLength: 0 };
    }
  }

  const codeBlockRegex = /```(?:json)?\s*([\s\S]*?)```/g;
  let codeBlockMatch: RegExpExecArray | null;
  while ((codeBlockMatch = codeBlockRegex.exec(trimmed)) !== null) {
    const parsed = tryParse((codeBlockMatch[1] ?? "").trim());
    if (!parsed.ok) continue;

    const preambleLength = codeBlockMatch.index;
    const suffixLength = trimmed.length - (codeBlockMatch.index + codeBlockMatch[0].length);
    return recordExtraction(parsed.value, "code_block", preambleLength, suffixLength, options);
  }

  let sawCandidate = false;
  for (let i = trimmed.indexOf("{"); i !== -1; i = trimmed.indexOf("{", i + 1)) {
    sawCandidate = true;
    const matched = matchObjectAt(trimmed, i);
    if (matched) {
      const suffixLength = trimmed.length - (i + matched.content.length);
      return recordExtraction(matched.json, "bracket_matching", i, suffixLength, options);
    }
  }

  throw new JsonExtractionError(
    sawCandidate
      ? "Failed to extract valid JSON object from response"
      : "No JSON object found in response: missing opening brace",
  );
}

function recordExtraction(
  json: unknown,
  extractionMethod: ExtractionMethod,
  preambleLength: number,
  suffixLength: number,
  options: JsonExtractionOptions,
): JsonExtractionResult {
  log.warn(
    {
      contract: options.contract,
      model: options.model,
      request_id: options.requestId,
      extraction_method: extractionMethod,
      preamble_length: preambleLength,
      suffix_length: suffixLength,
    },
    "JSON extraction required - provider returned text around the object",
  );
  emit(TelemetryEvents.JsonExtractionRequired, {
    contract: options.contract,
    model: options.model,
    extraction_method: extractionMethod,
    preamble_length: preambleLength,
    suffix_length: suffixLength,
  });
  return { json, wasExtracted: true, extractionMethod, preambleLength, suffixLength };
}

function tryParse(text: string): { ok: true; value: unknown } | { ok: false } {
  try {
    const value: unknown = JSON.parse(text);
    return { ok: true, value };
  } catch {
    return { ok: false };
  }
}

/**
 * Bracket-match a JSON object starting at `startIndex`, skipping braces
 * inside strings.
 */
function matchObjectAt(content: string, startIndex: number): { json: unknown; content: string } | null {
  let depth = 0;
  let inString = false;
  let escape = false;

  for (let i = startIndex; i < content.length; i++) {
    const char = content[i];

    if (escape) {
      escape = false;
      continue;
    }
    if (char === "\\") {
      escape = true;
      continue;
    }
    if (char === '"') {
      inString = !inString;
      continue;
    }
    if (inString) continue;

    if (char === "{" || char === "[") depth++;
    if (char === "}" || char === "]") depth--;

    if (depth === 0) {
      const jsonStr = content.slice(startIndex, i + 1);
      const parsed = tryParse(jsonStr);
      return parsed.ok ? { json: parsed.value, content: jsonStr } : null;
    }
  }

  // Unbalanced
  return null;
}
