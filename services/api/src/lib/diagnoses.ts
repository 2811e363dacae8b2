import fs from "node:fs/promises";
import path from "node:path";
import { z } from "zod";
import { BadRequestError } from "./errors";
import { createLogger } from "./logger";
import { parseMarkdownTree } from "./markdownTree";
import { DocumentStore, WriteResult } from "./storage";

const logger = createLogger("diagnoses");

export const DIAGNOSES_INDEX = "diagnoses";

export type DiagnosisRecord = {
  text: string;
  parentId: string | null;
};

export type DiagnosisNode = {
  id: string;
  text: string;
  children: DiagnosisNode[];
};

export type NewDiagnosis = {
  text: string;
  children?: NewDiagnosis[];
};

const diagnosisText = z.string().trim().min(1, "text must not be empty");

export const newDiagnosisSchema: z.ZodType<NewDiagnosis, z.ZodTypeDef, unknown> = z.lazy(() =>
  z.object({
    text: diagnosisText,
    children: z.array(newDiagnosisSchema).optional()
  })
);

export const updateDiagnosisSchema = z.object({ text: diagnosisText });

export type UpdateDiagnosis = z.infer<typeof updateDiagnosisSchema>;

export function parseBody<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, body: unknown): T {
  const parsed = schema.safeParse(body);
  if (parsed.success) return parsed.data;
  const issue = parsed.error.issues[0];
  const where = issue && issue.path.length ? `${issue.path.join(".")}: ` : "";
  throw new BadRequestError(`${where}${issue?.message ?? "invalid body"}`);
}

export async function listDiagnoses(store: DocumentStore): Promise<DiagnosisNode[]> {
  const found = await store.search<DiagnosisRecord>(DIAGNOSES_INDEX);
  const nodes = new Map<string, DiagnosisNode>();
  for (const hit of found.hits) nodes.set(hit._id, { id: hit._id, text: hit._source.text, children: [] });

  const roots: DiagnosisNode[] = [];
  for (const hit of found.hits) {
    const node = nodes.get(hit._id);
    if (!node) continue;
    const parent = hit._source.parentId ? nodes.get(hit._source.parentId) : undefined;
    if (parent) parent.children.push(node);
    else roots.push(node);
  }
  return roots;
}

export async function createDiagnosis(
  store: DocumentStore,
  diagnosis: NewDiagnosis,
  parentId: string | null = null
): Promise<WriteResult> {
  if (parentId) await store.read(DIAGNOSES_INDEX, parentId);
  const record: DiagnosisRecord = { text: diagnosis.text, parentId };
  const created = await store.create(DIAGNOSES_INDEX, record);
  for (const child of diagnosis.children ?? []) {
    await createDiagnosis(store, child, created._id);
  }
  logger.debug("Created diagnosis.", { id: created._id, parentId });
  return created;
}

export async function updateDiagnosis(store: DocumentStore, diagnosisId: string, update: UpdateDiagnosis): Promise<WriteResult> {
  await store.read(DIAGNOSES_INDEX, diagnosisId);
  return await store.update(DIAGNOSES_INDEX, diagnosisId, { text: update.text });
}

export async function deleteDiagnosis(store: DocumentStore, diagnosisId: string): Promise<number> {
  await store.read(DIAGNOSES_INDEX, diagnosisId);
  const children = await store.search<DiagnosisRecord>(DIAGNOSES_INDEX, { parentId: diagnosisId });
  let deleted = 0;
  for (const child of children.hits) deleted += await deleteDiagnosis(store, child._id);
  await store.delete(DIAGNOSES_INDEX, diagnosisId);
  logger.debug("Deleted diagnosis.", { id: diagnosisId, descendants: deleted });
  return deleted + 1;
}

type TaxonomyNode = {
  text: string;
  header?: boolean;
  children?: TaxonomyNode[];
};

const taxonomyNodeSchema: z.ZodType<TaxonomyNode, z.ZodTypeDef, unknown> = z.lazy(() =>
  z.object({
    text: diagnosisText,
    header: z.boolean().optional(),
    children: z.array(taxonomyNodeSchema).optional()
  })
);

// Body text under a heading (header: false) describes it and is not a diagnosis.
function toNewDiagnoses(nodes: TaxonomyNode[]): NewDiagnosis[] {
  return nodes
    .filter((n) => n.header !== false && n.text.trim().length > 0)
    .map((n) => ({ text: n.text, children: toNewDiagnoses(n.children ?? []) }));
}

export function fromTaxonomyTree(tree: TaxonomyNode[]): NewDiagnosis[] {
  const first = tree[0];
  const top = tree.length === 1 && first && first.text === "root" ? (first.children ?? []) : tree;
  return toNewDiagnoses(top);
}

export async function seedDiagnoses(store: DocumentStore, diagnoses: NewDiagnosis[]): Promise<number> {
  const existing = await store.search(DIAGNOSES_INDEX);
  if (existing.total > 0) {
    logger.info("Diagnoses already present, skipping seed.", { existing: existing.total });
    return 0;
  }
  let created = 0;
  const countNodes = (n: NewDiagnosis): number => 1 + (n.children ?? []).reduce((sum, c) => sum + countNodes(c), 0);
  for (const d of diagnoses) {
    await createDiagnosis(store, d);
    created += countNodes(d);
  }
  logger.info("Seeded diagnoses.", { created });
  return created;
}

export async function loadDiagnosesFile(filePath: string): Promise<NewDiagnosis[]> {
  const raw = await fs.readFile(filePath, "utf8");
  if (path.extname(filePath).toLowerCase() === ".json") {
    return fromTaxonomyTree(parseBody(z.array(taxonomyNodeSchema), JSON.parse(raw)));
  }
  return fromTaxonomyTree(parseMarkdownTree(raw));
}
