// src/services/backup/importReconciler.ts
// Merges a decoded backup into the live entity graph. Existing data always
// wins: a matched entity is skipped, never merged field by field. Stages run
// in dependency order because later stages remap foreign keys through the id
// maps built by earlier ones.

import { v4 as uuid } from "uuid";
import type { EntityGraph, EntityKind } from "../../domain/types";
import { startOfLocalDay } from "../../utils/date";
import type { DecodedGraph } from "./backupCodec";
import {
  findMatchingDailyLog,
  findMatchingFoodEntry,
  findMatchingProduct,
  findMatchingSupplement,
  findMatchingSupplementEntry,
  findMatchingTemplate,
} from "./matchers";

export interface ImportCounts {
  imported: number;
  skipped: number;
}

export type ImportSummary = Record<EntityKind, ImportCounts> & {
  /** Foreign keys that pointed nowhere and were dropped. */
  danglingReferences: number;
};

export interface ImportPlan {
  /** Entities to insert, already remapped. */
  creates: EntityGraph;
  summary: ImportSummary;
}

export function emptyImportSummary(): ImportSummary {
  return {
    products: { imported: 0, skipped: 0 },
    supplements: { imported: 0, skipped: 0 },
    dailyLogs: { imported: 0, skipped: 0 },
    foodEntries: { imported: 0, skipped: 0 },
    supplementEntries: { imported: 0, skipped: 0 },
    aiTemplates: { imported: 0, skipped: 0 },
    danglingReferences: 0,
  };
}

/**
 * Keep the incoming id unless something in the store already uses it.
 */
function claimId(incomingId: string, taken: Set<string>, newId: () => string): string {
  let id = incomingId;
  while (taken.has(id)) {
    id = newId();
  }
  taken.add(id);
  return id;
}

function idsOf(items: Array<{ id: string }>): Set<string> {
  return new Set(items.map((i) => i.id));
}

export function planImport(
  incoming: DecodedGraph,
  existing: EntityGraph,
  newId: () => string = uuid
): ImportPlan {
  const summary = emptyImportSummary();
  const creates: EntityGraph = {
    products: [],
    supplements: [],
    dailyLogs: [],
    foodEntries: [],
    supplementEntries: [],
    aiTemplates: [],
  };

  const resolveRef = (ref: string | null, map: Map<string, string>): string | null => {
    if (ref === null) return null;
    const mapped = map.get(ref);
    if (mapped === undefined) {
      summary.danglingReferences++;
      return null;
    }
    return mapped;
  };

  // 1. Products
  const productIds = new Map<string, string>();
  const productPool = [...existing.products];
  const takenProductIds = idsOf(existing.products);
  for (const product of incoming.products) {
    const match = findMatchingProduct(product, productPool);
    if (match) {
      productIds.set(product.id, match.id);
      summary.products.skipped++;
      continue;
    }
    const created = { ...product, id: claimId(product.id, takenProductIds, newId) };
    productIds.set(product.id, created.id);
    productPool.push(created);
    creates.products.push(created);
    summary.products.imported++;
  }

  // 2. Supplements
  const supplementIds = new Map<string, string>();
  const supplementPool = [...existing.supplements];
  const takenSupplementIds = idsOf(existing.supplements);
  for (const supplement of incoming.supplements) {
    const match = findMatchingSupplement(supplement, supplementPool);
    if (match) {
      supplementIds.set(supplement.id, match.id);
      summary.supplements.skipped++;
      continue;
    }
    const created = { ...supplement, id: claimId(supplement.id, takenSupplementIds, newId) };
    supplementIds.set(supplement.id, created.id);
    supplementPool.push(created);
    creates.supplements.push(created);
    summary.supplements.imported++;
  }

  // 3. Daily logs, one per local day
  const logIds = new Map<string, string>();
  const logPool = [...existing.dailyLogs];
  const takenLogIds = idsOf(existing.dailyLogs);
  for (const log of incoming.dailyLogs) {
    const match = findMatchingDailyLog(log, logPool);
    if (match) {
      logIds.set(log.id, match.id);
      summary.dailyLogs.skipped++;
      continue;
    }
    const created = { ...log, id: claimId(log.id, takenLogIds, newId), date: startOfLocalDay(log.date) };
    logIds.set(log.id, created.id);
    logPool.push(created);
    creates.dailyLogs.push(created);
    summary.dailyLogs.imported++;
  }

  // 4. Food entries; snapshot values are kept as exported
  const entryPool = [...existing.foodEntries];
  const takenEntryIds = idsOf(existing.foodEntries);
  for (const entry of incoming.foodEntries) {
    if (findMatchingFoodEntry(entry, entryPool)) {
      summary.foodEntries.skipped++;
      continue;
    }
    const created = {
      ...entry,
      id: claimId(entry.id, takenEntryIds, newId),
      productId: resolveRef(entry.productId, productIds),
      dailyLogId: resolveRef(entry.dailyLogId, logIds),
    };
    entryPool.push(created);
    creates.foodEntries.push(created);
    summary.foodEntries.imported++;
  }

  // 5. Supplement entries
  const supplementEntryPool = [...existing.supplementEntries];
  const takenSupplementEntryIds = idsOf(existing.supplementEntries);
  for (const entry of incoming.supplementEntries) {
    if (findMatchingSupplementEntry(entry, supplementEntryPool)) {
      summary.supplementEntries.skipped++;
      continue;
    }
    const created = {
      ...entry,
      id: claimId(entry.id, takenSupplementEntryIds, newId),
      supplementId: resolveRef(entry.supplementId, supplementIds),
      dailyLogId: resolveRef(entry.dailyLogId, logIds),
    };
    supplementEntryPool.push(created);
    creates.supplementEntries.push(created);
    summary.supplementEntries.imported++;
  }

  // 6. AI templates
  const templatePool = [...existing.aiTemplates];
  const takenTemplateIds = idsOf(existing.aiTemplates);
  for (const template of incoming.aiTemplates) {
    if (findMatchingTemplate(template, templatePool)) {
      summary.aiTemplates.skipped++;
      continue;
    }
    const created = { ...template, id: claimId(template.id, takenTemplateIds, newId) };
    templatePool.push(created);
    creates.aiTemplates.push(created);
    summary.aiTemplates.imported++;
  }

  return { creates, summary };
}

const SUMMARY_LABELS: Array<[EntityKind, string]> = [
  ["products", "products"],
  ["supplements", "supplements"],
  ["dailyLogs", "days"],
  ["foodEntries", "entries"],
  ["supplementEntries", "supplement doses"],
  ["aiTemplates", "templates"],
];

export function describeImportSummary(summary: ImportSummary): string {
  const parts = SUMMARY_LABELS.filter(([kind]) => summary[kind].imported > 0).map(
    ([kind, label]) => `${summary[kind].imported} ${label}`
  );
  if (parts.length === 0) {
    return "No new data imported (all items already exist)";
  }
  return `Imported: ${parts.join(", ")}`;
}

export function countSkipped(summary: ImportSummary): number {
  return SUMMARY_LABELS.reduce((total, [kind]) => total + summary[kind].skipped, 0);
}
