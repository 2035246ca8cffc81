// src/services/store/pgStore.ts
// Postgres-backed store. One table per entity kind; each row holds the entity
// in its backup record shape as JSONB, so the stored form and the export form
// never drift apart.

import { isNutritionError, StorageFailureError } from "../../domain/errors";
import { ENTITY_KINDS, EntityGraph, EntityKind, EntityTypes } from "../../domain/types";
import { Mutex } from "../../utils/mutex";
import { RECORD_CODECS, RecordCodec } from "../backup/backupCodec";
import type { NutritionStore, StoreReader, StoreTransaction } from "./types";

type PayloadRow = { id: string; payload: unknown };

/** The slice of pg's Pool / PoolClient this store uses. */
export interface PgQueryable {
  query(text: string, values?: unknown[]): Promise<{ rows: PayloadRow[]; rowCount: number | null }>;
}

export interface PgClient extends PgQueryable {
  release(err?: Error | boolean): void;
}

export interface PgPool extends PgQueryable {
  connect(): Promise<PgClient>;
}

export const TABLE_NAMES: { [K in EntityKind]: string } = {
  products: "nutrition_products",
  supplements: "nutrition_supplements",
  dailyLogs: "nutrition_daily_logs",
  foodEntries: "nutrition_food_entries",
  supplementEntries: "nutrition_supplement_entries",
  aiTemplates: "nutrition_ai_templates",
};

function decodeRow<K extends EntityKind>(kind: K, row: PayloadRow): EntityTypes[K] {
  const codec: RecordCodec<EntityTypes[K]> = RECORD_CODECS[kind];
  try {
    return codec.decode(row.payload);
  } catch (err) {
    throw new StorageFailureError(`Corrupt ${kind} row ${row.id}`, err);
  }
}

class PgReader implements StoreReader {
  constructor(protected readonly db: PgQueryable) {}

  async list<K extends EntityKind>(kind: K): Promise<EntityTypes[K][]> {
    const result = await this.db.query(`SELECT id, payload FROM ${TABLE_NAMES[kind]} ORDER BY id`);
    return result.rows.map((row) => decodeRow(kind, row));
  }

  async get<K extends EntityKind>(kind: K, id: string): Promise<EntityTypes[K] | undefined> {
    const result = await this.db.query(`SELECT id, payload FROM ${TABLE_NAMES[kind]} WHERE id = $1`, [id]);
    const row = result.rows[0];
    return row ? decodeRow(kind, row) : undefined;
  }
}

class PgTransaction extends PgReader implements StoreTransaction {
  async insert<K extends EntityKind>(kind: K, entity: EntityTypes[K]): Promise<void> {
    const codec: RecordCodec<EntityTypes[K]> = RECORD_CODECS[kind];
    await this.db.query(`INSERT INTO ${TABLE_NAMES[kind]} (id, payload) VALUES ($1, $2::jsonb)`, [
      entity.id,
      JSON.stringify(codec.encode(entity)),
    ]);
  }

  async update<K extends EntityKind>(kind: K, entity: EntityTypes[K]): Promise<void> {
    const codec: RecordCodec<EntityTypes[K]> = RECORD_CODECS[kind];
    const result = await this.db.query(`UPDATE ${TABLE_NAMES[kind]} SET payload = $2::jsonb WHERE id = $1`, [
      entity.id,
      JSON.stringify(codec.encode(entity)),
    ]);
    if (!result.rowCount) {
      throw new StorageFailureError(`No ${kind} row with id ${entity.id}`);
    }
  }

  async remove(kind: EntityKind, id: string): Promise<boolean> {
    const result = await this.db.query(`DELETE FROM ${TABLE_NAMES[kind]} WHERE id = $1`, [id]);
    return (result.rowCount ?? 0) > 0;
  }
}

export class PgNutritionStore implements NutritionStore {
  private readonly lock = new Mutex();
  private readonly reader: PgReader;

  constructor(private readonly pool: PgPool) {
    this.reader = new PgReader(pool);
  }

  async ensureSchema(): Promise<void> {
    console.log("[Store] Ensuring nutrition tables exist...");
    for (const kind of ENTITY_KINDS) {
      await this.pool.query(`
        CREATE TABLE IF NOT EXISTS ${TABLE_NAMES[kind]} (
          id TEXT PRIMARY KEY,
          payload JSONB NOT NULL
        );
      `);
    }
    console.log("[Store] Nutrition tables ready");
  }

  list<K extends EntityKind>(kind: K): Promise<EntityTypes[K][]> {
    return this.reader.list(kind);
  }

  get<K extends EntityKind>(kind: K, id: string): Promise<EntityTypes[K] | undefined> {
    return this.reader.get(kind, id);
  }

  /** All six tables from one REPEATABLE READ view, so cross-references line up. */
  async snapshot(): Promise<EntityGraph> {
    return this.lock.runExclusive(() =>
      this.withTransaction("BEGIN ISOLATION LEVEL REPEATABLE READ", async (client) => {
        const reader = new PgReader(client);
        return {
          products: await reader.list("products"),
          supplements: await reader.list("supplements"),
          dailyLogs: await reader.list("dailyLogs"),
          foodEntries: await reader.list("foodEntries"),
          supplementEntries: await reader.list("supplementEntries"),
          aiTemplates: await reader.list("aiTemplates"),
        };
      })
    );
  }

  async transaction<T>(work: (tx: StoreTransaction) => Promise<T>): Promise<T> {
    return this.lock.runExclusive(() => this.withTransaction("BEGIN", (client) => work(new PgTransaction(client))));
  }

  private async withTransaction<T>(begin: string, work: (client: PgClient) => Promise<T>): Promise<T> {
    let client: PgClient;
    try {
      client = await this.pool.connect();
    } catch (err) {
      throw new StorageFailureError("Could not acquire a database connection", err);
    }

    try {
      await client.query(begin);
      const result = await work(client);
      await client.query("COMMIT");
      return result;
    } catch (err) {
      try {
        await client.query("ROLLBACK");
      } catch (rollbackErr) {
        console.error("[Store] Rollback failed:", rollbackErr);
      }
      if (isNutritionError(err)) throw err;
      throw new StorageFailureError("Database transaction failed", err);
    } finally {
      client.release();
    }
  }
}
