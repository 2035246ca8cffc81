import "dotenv/config";
import { createApp } from "./app";
import { createPool } from "./db/pool";
import { getEnv, settingsFromEnv, validateEnvironment } from "./middleware";
import { createServices } from "./services";
import { MemoryNutritionStore } from "./services/store/memoryStore";
import { PgNutritionStore } from "./services/store/pgStore";
import type { NutritionStore } from "./services/store/types";

async function createStore(): Promise<NutritionStore> {
  const env = getEnv();
  if (env.STORAGE_DRIVER === "postgres" && env.DATABASE_URL) {
    const store = new PgNutritionStore(createPool(env.DATABASE_URL));
    await store.ensureSchema();
    console.log("[Store] Using Postgres storage");
    return store;
  }
  console.log("[Store] Using in-memory storage");
  return new MemoryNutritionStore();
}

async function main(): Promise<void> {
  const env = validateEnvironment();
  const store = await createStore();
  const services = createServices(store, settingsFromEnv(env));

  const app = createApp({
    services,
    backupMaxBytes: env.BACKUP_MAX_BYTES,
    logRequests: env.NODE_ENV !== "test",
  });

  const port = Number(env.PORT);
  app.listen(port, () => {
    console.log(`[Server] Nutrition ledger listening on port ${port}`);
  });
}

main().catch((err) => {
  console.error("[Server] Startup failed:", err);
  process.exit(1);
});
