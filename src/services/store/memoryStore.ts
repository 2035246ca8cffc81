import { StorageFailureError } from "../../domain/errors";
import type { EntityGraph, EntityKind, EntityTypes } from "../../domain/types";
import { Mutex } from "../../utils/mutex";
import type { NutritionStore, StoreTransaction } from "./types";

type Tables = { [K in EntityKind]: Map<string, EntityTypes[K]> };

function emptyTables(): Tables {
  return {
    products: new Map(),
    supplements: new Map(),
    dailyLogs: new Map(),
    foodEntries: new Map(),
    supplementEntries: new Map(),
    aiTemplates: new Map(),
  };
}

function copyTables(t: Tables): Tables {
  return {
    products: new Map(t.products),
    supplements: new Map(t.supplements),
    dailyLogs: new Map(t.dailyLogs),
    foodEntries: new Map(t.foodEntries),
    supplementEntries: new Map(t.supplementEntries),
    aiTemplates: new Map(t.aiTemplates),
  };
}

function cloneBuffer(data: Buffer | null): Buffer | null {
  return data ? Buffer.from(data) : null;
}

// Nothing outside the tables may share a nutrient map, image or date with them.
const CLONERS: { [K in EntityKind]: (e: EntityTypes[K]) => EntityTypes[K] } = {
  products: (p) => ({
    ...p,
    nutrients: { ...p.nutrients },
    imageData: cloneBuffer(p.imageData),
    mainImageData: cloneBuffer(p.mainImageData),
    dateAdded: new Date(p.dateAdded.getTime()),
  }),
  supplements: (s) => ({
    ...s,
    nutrients: { ...s.nutrients },
    imageData: cloneBuffer(s.imageData),
    dateAdded: new Date(s.dateAdded.getTime()),
  }),
  dailyLogs: (l) => ({ ...l, date: new Date(l.date.getTime()) }),
  foodEntries: (e) => ({ ...e, nutrients: { ...e.nutrients }, timestamp: new Date(e.timestamp.getTime()) }),
  supplementEntries: (e) => ({ ...e, nutrients: { ...e.nutrients }, timestamp: new Date(e.timestamp.getTime()) }),
  aiTemplates: (t) => ({
    ...t,
    nutrients: { ...t.nutrients },
    dateCreated: new Date(t.dateCreated.getTime()),
    lastUsed: new Date(t.lastUsed.getTime()),
  }),
};

function cloneEntity<K extends EntityKind>(kind: K, entity: EntityTypes[K]): EntityTypes[K] {
  const clone: (e: EntityTypes[K]) => EntityTypes[K] = CLONERS[kind];
  return clone(entity);
}

function listTable<K extends EntityKind>(tables: Tables, kind: K): EntityTypes[K][] {
  const table: Map<string, EntityTypes[K]> = tables[kind];
  return Array.from(table.values(), (e) => cloneEntity(kind, e));
}

function getFromTable<K extends EntityKind>(tables: Tables, kind: K, id: string): EntityTypes[K] | undefined {
  const table: Map<string, EntityTypes[K]> = tables[kind];
  const found = table.get(id);
  return found ? cloneEntity(kind, found) : undefined;
}

function putAll<K extends EntityKind>(tables: Tables, kind: K, entities: EntityTypes[K][] = []): void {
  const table: Map<string, EntityTypes[K]> = tables[kind];
  for (const e of entities) table.set(e.id, cloneEntity(kind, e));
}

class MemoryTransaction implements StoreTransaction {
  constructor(private readonly tables: Tables) {}

  async list<K extends EntityKind>(kind: K): Promise<EntityTypes[K][]> {
    return listTable(this.tables, kind);
  }

  async get<K extends EntityKind>(kind: K, id: string): Promise<EntityTypes[K] | undefined> {
    return getFromTable(this.tables, kind, id);
  }

  async insert<K extends EntityKind>(kind: K, entity: EntityTypes[K]): Promise<void> {
    const table: Map<string, EntityTypes[K]> = this.tables[kind];
    if (table.has(entity.id)) {
      throw new StorageFailureError(`Duplicate id ${entity.id} in ${kind}`);
    }
    table.set(entity.id, cloneEntity(kind, entity));
  }

  async update<K extends EntityKind>(kind: K, entity: EntityTypes[K]): Promise<void> {
    const table: Map<string, EntityTypes[K]> = this.tables[kind];
    if (!table.has(entity.id)) {
      throw new StorageFailureError(`No ${kind} row with id ${entity.id}`);
    }
    table.set(entity.id, cloneEntity(kind, entity));
  }

  async remove(kind: EntityKind, id: string): Promise<boolean> {
    return this.tables[kind].delete(id);
  }
}

/**
 * Process-local store. A transaction works on copies of the tables and swaps
 * them in only when the work resolves.
 */
export class MemoryNutritionStore implements NutritionStore {
  private tables: Tables = emptyTables();
  private readonly lock = new Mutex();

  static fromGraph(graph: Partial<EntityGraph>): MemoryNutritionStore {
    const store = new MemoryNutritionStore();
    const t = store.tables;
    putAll(t, "products", graph.products);
    putAll(t, "supplements", graph.supplements);
    putAll(t, "dailyLogs", graph.dailyLogs);
    putAll(t, "foodEntries", graph.foodEntries);
    putAll(t, "supplementEntries", graph.supplementEntries);
    putAll(t, "aiTemplates", graph.aiTemplates);
    return store;
  }

  async list<K extends EntityKind>(kind: K): Promise<EntityTypes[K][]> {
    return listTable(this.tables, kind);
  }

  async get<K extends EntityKind>(kind: K, id: string): Promise<EntityTypes[K] | undefined> {
    return getFromTable(this.tables, kind, id);
  }

  async snapshot(): Promise<EntityGraph> {
    const t = this.tables;
    return {
      products: listTable(t, "products"),
      supplements: listTable(t, "supplements"),
      dailyLogs: listTable(t, "dailyLogs"),
      foodEntries: listTable(t, "foodEntries"),
      supplementEntries: listTable(t, "supplementEntries"),
      aiTemplates: listTable(t, "aiTemplates"),
    };
  }

  async transaction<T>(work: (tx: StoreTransaction) => Promise<T>): Promise<T> {
    return this.lock.runExclusive(async () => {
      const working = copyTables(this.tables);
      const result = await work(new MemoryTransaction(working));
      this.tables = working;
      return result;
    });
  }
}
