import crypto from "node:crypto";
import fs from "node:fs/promises";
import path from "node:path";
import { DocumentNotFoundError, StoreError } from "./errors";
import { createLogger } from "./logger";

const logger = createLogger("store");

export type DocumentBody = Record<string, unknown>;

export type StoredDocument<T extends DocumentBody = DocumentBody> = T & {
  created_at: string;
  modified_at: string;
};

export type WriteResult = {
  _id: string;
  result: "created" | "updated" | "deleted";
};

export type SearchHit<T extends DocumentBody = DocumentBody> = {
  _id: string;
  _source: StoredDocument<T>;
};

export type SearchResult<T extends DocumentBody = DocumentBody> = {
  total: number;
  hits: Array<SearchHit<T>>;
};

export type SearchFilter = Record<string, string | number | boolean | null>;

export interface DocumentStore {
  create(index: string, document: DocumentBody): Promise<WriteResult>;
  read<T extends DocumentBody = DocumentBody>(index: string, documentId: string): Promise<StoredDocument<T>>;
  update(index: string, documentId: string, document: DocumentBody): Promise<WriteResult>;
  delete(index: string, documentId: string): Promise<void>;
  search<T extends DocumentBody = DocumentBody>(index: string, filter?: SearchFilter): Promise<SearchResult<T>>;
}

export function newDocumentId(): string {
  return crypto.randomUUID().replace(/-/g, "");
}

function safeSegment(kind: string, raw: string): string {
  const x = raw.trim();
  if (!/^[a-z0-9][a-z0-9_-]{0,63}$/i.test(x)) throw new StoreError(`invalid ${kind}: ${raw}`);
  return x;
}

export class FileDocumentStore implements DocumentStore {
  private readonly baseDir: string;
  private tail: Promise<void> = Promise.resolve();
  private lastStamp = 0;

  constructor(baseDir: string) {
    this.baseDir = baseDir;
  }

  async create(index: string, document: DocumentBody): Promise<WriteResult> {
    if ("created_at" in document || "modified_at" in document) {
      throw new StoreError("Document should not already have a 'created_at' or 'modified_at' field.");
    }
    const id = newDocumentId();
    await this.withLock(async () => {
      const now = this.nextStamp();
      const filePath = await this.documentPath(index, id, true);
      await writeJson(filePath, { ...document, created_at: now, modified_at: now });
    });
    logger.debug("created document", { index, id });
    return { _id: id, result: "created" };
  }

  async read<T extends DocumentBody = DocumentBody>(index: string, documentId: string): Promise<StoredDocument<T>> {
    const filePath = await this.documentPath(index, documentId, false);
    return await readJson<StoredDocument<T>>(filePath).catch((e: unknown) => {
      if (isMissingFile(e)) throw new DocumentNotFoundError(index, documentId);
      throw e;
    });
  }

  async update(index: string, documentId: string, document: DocumentBody): Promise<WriteResult> {
    if ("created_at" in document) {
      throw new StoreError("Document should not already have a 'created_at' field.");
    }
    await this.withLock(async () => {
      const filePath = await this.documentPath(index, documentId, false);
      if (!(await fileExists(filePath))) throw new DocumentNotFoundError(index, documentId);
      const current = await readJson<StoredDocument>(filePath);
      await writeJson(filePath, { ...current, ...document, created_at: current.created_at, modified_at: this.nextStamp() });
    });
    logger.debug("updated document", { index, id: documentId });
    return { _id: documentId, result: "updated" };
  }

  async delete(index: string, documentId: string): Promise<void> {
    await this.withLock(async () => {
      const filePath = await this.documentPath(index, documentId, false);
      if (!(await fileExists(filePath))) throw new DocumentNotFoundError(index, documentId);
      await fs.unlink(filePath);
    });
    logger.debug("deleted document", { index, id: documentId });
  }

  async search<T extends DocumentBody = DocumentBody>(index: string, filter: SearchFilter = {}): Promise<SearchResult<T>> {
    const dir = this.indexDir(index);
    const names = await fs.readdir(dir).catch((e: unknown) => {
      if (isMissingFile(e)) return [];
      throw e;
    });
    const hits: Array<SearchHit<T>> = [];
    for (const name of names) {
      if (!name.endsWith(".json") || name.startsWith(".")) continue;
      // Deleted between readdir and read.
      const source = await readJson<StoredDocument<T>>(path.join(dir, name)).catch((e: unknown) => {
        if (isMissingFile(e)) return null;
        throw e;
      });
      if (!source) continue;
      const matches = Object.entries(filter).every(([k, v]) => (source[k] ?? null) === v);
      if (matches) hits.push({ _id: name.slice(0, -".json".length), _source: source });
    }
    hits.sort((a, b) => a._source.created_at.localeCompare(b._source.created_at) || a._id.localeCompare(b._id));
    return { total: hits.length, hits };
  }

  // Strictly increasing within one store so that created_at orders creations.
  private nextStamp(): string {
    this.lastStamp = Math.max(Date.now(), this.lastStamp + 1);
    return new Date(this.lastStamp).toISOString();
  }

  private indexDir(index: string): string {
    return path.join(this.baseDir, safeSegment("index", index));
  }

  private async documentPath(index: string, documentId: string, ensureDir: boolean): Promise<string> {
    const dir = this.indexDir(index);
    if (ensureDir) await fs.mkdir(dir, { recursive: true });
    if (!/^[a-z0-9][a-z0-9_-]{0,63}$/i.test(documentId)) throw new DocumentNotFoundError(index, documentId);
    return path.join(dir, `${documentId}.json`);
  }

  private async withLock<T>(fn: () => Promise<T>): Promise<T> {
    const run = async (): Promise<T> => await fn();
    const p = this.tail.then(run, run);
    this.tail = p.then(
      () => undefined,
      () => undefined
    );
    return p;
  }
}

export async function writeJson(filePath: string, data: unknown): Promise<void> {
  const tmpPath = path.join(path.dirname(filePath), `.${path.basename(filePath)}.${newDocumentId()}.tmp`);
  await fs.writeFile(tmpPath, JSON.stringify(data, null, 2), "utf8");
  await fs.rename(tmpPath, filePath);
}

// Retries reads that race a writer; a missing file is final and is thrown at once.
export async function readJson<T>(filePath: string, attempts = 4): Promise<T> {
  for (let attempt = 1; ; attempt++) {
    try {
      const raw = await fs.readFile(filePath, "utf8");
      return JSON.parse(raw) as T;
    } catch (e) {
      if (isMissingFile(e) || attempt >= attempts) throw e;
      logger.debug("retrying read", { filePath, attempt });
      await new Promise((r) => setTimeout(r, 30 * attempt));
    }
  }
}

export async function fileExists(filePath: string): Promise<boolean> {
  return await fs.access(filePath).then(
    () => true,
    (e: unknown) => {
      if (isMissingFile(e)) return false;
      throw e;
    }
  );
}

function isMissingFile(e: unknown): boolean {
  return typeof e === "object" && e !== null && "code" in e && e.code === "ENOENT";
}
