import { readFileSync } from "node:fs";
import {
  CacheStore,
  CalDAVHandler,
  HttpUpstreamClient,
  SyncEngine,
  createLogger,
  describeError,
  loadConfig,
} from "@taskdav/core";
import { createServer } from "./server.js";

function readVersion(): string {
  const raw: unknown = JSON.parse(
    readFileSync(new URL("../package.json", import.meta.url), "utf-8"),
  );
  if (typeof raw === "object" && raw !== null && "version" in raw && typeof raw.version === "string") {
    return raw.version;
  }
  return "0.0.0";
}

async function main() {
  const config = loadConfig();
  const logger = createLogger({
    level: config.logging.level,
    pretty: config.logging.pretty,
  });

  const codec = { alarms: config.ical.alarms };
  const store = new CacheStore({
    codec,
    historyLimit: config.sync.historyLimit,
    logger,
  });

  const upstream = new HttpUpstreamClient({
    baseUrl: config.upstream.baseUrl,
    token: config.upstream.token,
    logger,
  });

  const engine = new SyncEngine({
    upstream,
    store,
    intervalMs: config.sync.intervalMs,
    timeoutMs: config.upstream.timeoutMs,
    syncOnStart: config.sync.syncOnStart,
    backoff: config.sync.backoff,
    logger,
  });

  const handler = new CalDAVHandler({
    store,
    username: config.caldav.username,
    password: config.caldav.password,
    realm: config.caldav.realm,
    publicTokens: config.caldav.publicTokens,
    timezone: config.ical.timezone,
    codec,
    logger,
  });

  const server = await createServer({
    handler,
    engine,
    store,
    logger,
    version: readVersion(),
  });

  engine.start();
  await server.listen({ port: config.server.port, host: config.server.host });
  logger.info(
    { host: config.server.host, port: config.server.port, upstream: config.upstream.baseUrl },
    "taskdav listening",
  );

  let shuttingDown = false;
  const shutdown = async (signal: string) => {
    if (shuttingDown) return;
    shuttingDown = true;
    logger.info({ signal }, "shutting down");

    try {
      // Stop syncing first; requests still in flight finish against the last snapshot
      await engine.stop();
      await server.close();
      logger.info("server closed");
      process.exit(0);
    } catch (err) {
      logger.error({ err: describeError(err) }, "error during shutdown");
      process.exit(1);
    }
  };

  process.on("SIGINT", () => void shutdown("SIGINT"));
  process.on("SIGTERM", () => void shutdown("SIGTERM"));
}

main().catch((err) => {
  console.error("Fatal error:", err);
  process.exit(1);
});
