// backend/services/timetracker/src/storeFactory.ts
import type { StoreConfig } from "./config";
import type { StoreProvider } from "./store/RecordStore";
import { MemoryStoreProvider } from "./store/memoryStore";
import { MongoStoreProvider } from "./store/mongoStore";

export async function openStore(cfg: StoreConfig): Promise<StoreProvider> {
  if (cfg.kind === "memory") return new MemoryStoreProvider();
  const mongo = new MongoStoreProvider(cfg.uri);
  await mongo.connect();
  return mongo;
}
