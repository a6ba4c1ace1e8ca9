import { env } from "./config/env";
import { ReadingStore } from "./db/reading-store";
import { DeviceAuthorizer } from "./services/device-authorizer";
import { buildApp } from "./app";

async function start() {
  const store = await ReadingStore.open(env.DB_FILE);

  try {
    store.ensureSchema();
  } catch (error) {
    store.close();
    throw error;
  }

  const app = buildApp({
    store,
    authorizer: new DeviceAuthorizer(env.ALLOWLIST_FILE),
    maxViewRows: env.MAX_VIEW_ROWS,
    logger: { level: env.LOG_LEVEL }
  });
  app.addHook("onClose", async () => {
    store.close();
  });

  for (const signal of ["SIGINT", "SIGTERM"] as const) {
    process.once(signal, () => {
      app.close().catch((error: unknown) => {
        app.log.error({ err: error }, "shutdown failed");
        process.exitCode = 1;
      });
    });
  }

  try {
    await app.listen({
      host: env.HOST,
      port: env.PORT
    });
  } catch (error) {
    await app.close();
    throw error;
  }
}

start().catch((error) => {
  // eslint-disable-next-line no-console
  console.error(error);
  process.exit(1);
});
