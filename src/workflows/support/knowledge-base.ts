import { existsSync } from "node:fs";
import { readFile } from "node:fs/promises";
import { resolve } from "node:path";
import { fileURLToPath } from "node:url";
import { z } from "zod";
import { log } from "../../utils/telemetry.js";

export const KnowledgeRecord = z.object({
  id: z.number().int(),
  question: z.string().min(1),
  answer: z.string().min(1),
});
export type KnowledgeRecord = z.infer<typeof KnowledgeRecord>;

const KnowledgeCorpus = z.object({
  records: z.array(KnowledgeRecord),
});

/**
 * Knowledge lookup. Returns the entire corpus for every query: there is no
 * ranking or filtering.
 */
export interface KnowledgeBase {
  lookup(query: string): Promise<readonly KnowledgeRecord[]>;
}

export class KnowledgeBaseLoadError extends Error {
  readonly name = "KnowledgeBaseLoadError";
}

export class InMemoryKnowledgeBase implements KnowledgeBase {
  private readonly records: readonly KnowledgeRecord[];

  constructor(records: readonly KnowledgeRecord[]) {
    this.records = Object.freeze([...records]);
  }

  async lookup(_query: string): Promise<readonly KnowledgeRecord[]> {
    return this.records;
  }
}

/**
 * Default corpus shipped with the service.
 *
 * Resolved relative to THIS FILE so it works from both src/ (tsx, vitest)
 * and dist/src/ (node).
 */
export function defaultKnowledgeBasePath(): string {
  const fromSource = fileURLToPath(new URL("../../../data/knowledge-base.json", import.meta.url));
  if (existsSync(fromSource)) {
    return fromSource;
  }
  return fileURLToPath(new URL("../../../../data/knowledge-base.json", import.meta.url));
}

/**
 * JSON-file corpus (`{ "records": [...] }`), read once on first lookup.
 */
export class FileKnowledgeBase implements KnowledgeBase {
  readonly path: string;
  private loading: Promise<readonly KnowledgeRecord[]> | null = null;

  constructor(path?: string) {
    this.path = path ? resolve(path) : defaultKnowledgeBasePath();
  }

  lookup(_query: string): Promise<readonly KnowledgeRecord[]> {
    if (this.loading === null) {
      // A failed load is retried on the next lookup
      this.loading = this.load().catch((error: unknown) => {
        this.loading = null;
        throw error;
      });
    }
    return this.loading;
  }

  private async load(): Promise<readonly KnowledgeRecord[]> {
    let raw: string;
    try {
      raw = await readFile(this.path, "utf-8");
    } catch (error) {
      throw new KnowledgeBaseLoadError(`knowledge base not readable at ${this.path}`, { cause: error });
    }

    let json: unknown;
    try {
      json = JSON.parse(raw);
    } catch (error) {
      throw new KnowledgeBaseLoadError(`knowledge base at ${this.path} is not valid JSON`, { cause: error });
    }

    const parsed = KnowledgeCorpus.safeParse(json);
    if (!parsed.success) {
      throw new KnowledgeBaseLoadError(
        `knowledge base at ${this.path} is malformed: ${parsed.error.issues.map((i) => i.message).join("; ")}`,
      );
    }

    log.info({ path: this.path, records: parsed.data.records.length }, "knowledge base loaded");
    return Object.freeze(parsed.data.records);
  }
}
