import { loadEnv } from "./config/env.js";
import { buildApp } from "./lib/app.js";
import { MemoryStore } from "./services/memory-store.js";
import type { DataStore } from "./services/store.js";

async function main() {
  const env = loadEnv();
  const store: DataStore = new MemoryStore();
  const app = await buildApp(store, env);

  app.addHook("onClose", async () => {
    if (store.close) {
      await store.close();
    }
  });

  try {
    await app.listen({ port: env.PORT, host: env.HOST });
    app.log.info(`sample-architecture-api listening on http://${env.HOST}:${env.PORT} (store=${store.kind()})`);
  } catch (error) {
    app.log.error(error);
    process.exit(1);
  }
}

void main();
