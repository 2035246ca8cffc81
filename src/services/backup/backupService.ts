// src/services/backup/backupService.ts
// Export / import of the full dataset as one JSON backup document.

import { isNutritionError, StorageFailureError } from "../../domain/errors";
import type { EntityGraph } from "../../domain/types";
import type { NutritionStore, StoreTransaction } from "../store/types";
import { backupFileName, decodeBackup, exportBackupBytes } from "./backupCodec";
import { countSkipped, describeImportSummary, ImportSummary, planImport } from "./importReconciler";

export interface BackupServiceOptions {
  /** Defaults to the wall clock; injected by tests for stable exports. */
  now?: () => Date;
  newId?: () => string;
}

export interface ExportedBackup {
  fileName: string;
  bytes: Buffer;
}

async function readGraph(tx: StoreTransaction): Promise<EntityGraph> {
  return {
    products: await tx.list("products"),
    supplements: await tx.list("supplements"),
    dailyLogs: await tx.list("dailyLogs"),
    foodEntries: await tx.list("foodEntries"),
    supplementEntries: await tx.list("supplementEntries"),
    aiTemplates: await tx.list("aiTemplates"),
  };
}

async function insertAll(tx: StoreTransaction, creates: EntityGraph): Promise<void> {
  // parents before children
  for (const e of creates.products) await tx.insert("products", e);
  for (const e of creates.supplements) await tx.insert("supplements", e);
  for (const e of creates.dailyLogs) await tx.insert("dailyLogs", e);
  for (const e of creates.foodEntries) await tx.insert("foodEntries", e);
  for (const e of creates.supplementEntries) await tx.insert("supplementEntries", e);
  for (const e of creates.aiTemplates) await tx.insert("aiTemplates", e);
}

export class BackupService {
  private readonly now: () => Date;
  private readonly newId: (() => string) | undefined;

  constructor(private readonly store: NutritionStore, options: BackupServiceOptions = {}) {
    this.now = options.now ?? (() => new Date());
    this.newId = options.newId;
  }

  async exportBackup(): Promise<ExportedBackup> {
    const exportDate = this.now();
    const graph = await this.store.snapshot();
    const bytes = exportBackupBytes(graph, exportDate);
    console.log(
      `[Backup] Exported ${graph.products.length} products, ${graph.dailyLogs.length} days, ${graph.foodEntries.length} entries (${bytes.length} bytes)`
    );
    return { fileName: backupFileName(exportDate), bytes };
  }

  /**
   * Merge a backup into the store. The document is decoded before anything is
   * touched, so codec errors leave the store as it was; the change set is then
   * planned and applied inside one transaction.
   */
  async importBackup(bytes: Buffer | string): Promise<ImportSummary> {
    const incoming = decodeBackup(bytes);

    let summary: ImportSummary;
    try {
      summary = await this.store.transaction(async (tx) => {
        const existing = await readGraph(tx);
        const plan = this.newId ? planImport(incoming, existing, this.newId) : planImport(incoming, existing);
        await insertAll(tx, plan.creates);
        return plan.summary;
      });
    } catch (err) {
      if (isNutritionError(err)) throw err;
      console.error("[Backup] Import failed, store left unchanged:", err);
      throw new StorageFailureError("Failed to apply backup import", err);
    }

    console.log(`[Backup] ${describeImportSummary(summary)} (${countSkipped(summary)} skipped)`);
    if (summary.danglingReferences > 0) {
      console.warn(`[Backup] Dropped ${summary.danglingReferences} references to entities missing from the backup`);
    }
    return summary;
  }
}
