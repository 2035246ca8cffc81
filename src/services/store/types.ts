import type { EntityGraph, EntityKind, EntityTypes } from "../../domain/types";

export interface StoreReader {
  list<K extends EntityKind>(kind: K): Promise<EntityTypes[K][]>;
  get<K extends EntityKind>(kind: K, id: string): Promise<EntityTypes[K] | undefined>;
}

export interface StoreTransaction extends StoreReader {
  insert<K extends EntityKind>(kind: K, entity: EntityTypes[K]): Promise<void>;
  update<K extends EntityKind>(kind: K, entity: EntityTypes[K]): Promise<void>;
  remove(kind: EntityKind, id: string): Promise<boolean>;
}

/**
 * Id-indexed entity tables. Relationships are plain id fields; cascade and
 * nullify deletes are explicit sweeps done by the services.
 *
 * All writes go through transaction(), which implementations serialize behind
 * one in-process lock and apply all-or-nothing.
 */
export interface NutritionStore extends StoreReader {
  snapshot(): Promise<EntityGraph>;
  transaction<T>(work: (tx: StoreTransaction) => Promise<T>): Promise<T>;
}
