#!/usr/bin/env node
/**
 * Crossline entry point.
 *
 * Wires together:
 * - Config loading and console/file logging
 * - Identity store and asset cache (SQLite)
 * - Matrix channel (local side)
 * - Bridge service client, identity resolution, attachment pipeline
 * - The bridge itself, with its push stream supervisor
 * - Bind/unbind commands
 * - Optional uptime heartbeat
 *
 * Flow:
 * 1. Load config, ensure data directories exist
 * 2. Open the stores
 * 3. Start the Matrix channel (initial sync skips the backlog)
 * 4. Once ready, start the push stream
 * 5. Run until SIGINT/SIGTERM; restart after a fatal error
 */

import { loadConfig, ensureDataDirs, type Config } from "./config.js";
import { createAppLogger, installConsoleFileLogging } from "./logger.js";
import { MatrixChannel } from "./channels/matrix.js";
import { handleCommand } from "./commands.js";
import { HeartbeatPinger } from "./heartbeat.js";
import { createSqliteIdentityStore, type IdentityStore } from "./bridge/identity-store.js";
import { createAssetCache, AvatarResolver, type AssetCache } from "./bridge/asset-cache.js";
import { createMediaToolkit } from "./bridge/media.js";
import { RemoteApi } from "./bridge/remote-api.js";
import { IdentityResolver } from "./bridge/identity-resolver.js";
import { AttachmentPipeline } from "./bridge/attachments.js";
import { Bridge } from "./bridge/bridge.js";

interface RunningApp {
  stop(): Promise<void>;
}

function wireBridge(
  config: Config,
  platform: MatrixChannel,
  store: IdentityStore,
  cache: AssetCache,
): Bridge | null {
  const cfg = config.bridge;
  if (!cfg) return null;

  const api = new RemoteApi({
    bridgeEndpoint: cfg.bridge_endpoint,
    token: cfg.token,
    webhookUrl: cfg.webhook_url,
    webhookWait: cfg.webhook_wait,
    remoteApiBase: cfg.remote_api_base,
    guildId: cfg.guild_id,
  });
  const identities = new IdentityResolver(api, platform, { userTtlMs: cfg.user_cache_ttl_seconds * 1000 });
  const media = createMediaToolkit({ ffmpegPath: cfg.ffmpeg_path });

  const bridge = new Bridge(
    {
      platform,
      api,
      identities,
      store,
      avatars: new AvatarResolver(cache, platform, media),
      attachments: new AttachmentPipeline({
        platform,
        cache,
        media,
        maxUploadBytes: cfg.max_upload_bytes,
        thumbnailThresholdBytes: cfg.thumbnail_threshold_bytes,
      }),
    },
    {
      roomId: cfg.room_id,
      selfAuthor: cfg.self_author,
      commandPrefix: config.matrix.command_prefix,
      ignoredPrefixes: cfg.ignored_prefixes,
      videoEmbedPrefix: cfg.video_embed_prefix,
      groupingWindowSeconds: cfg.grouping_window_seconds,
      stream: {
        url: cfg.websocket_endpoint,
        token: cfg.token,
        reconnectBaseMs: cfg.reconnect_base_ms,
        reconnectMaxMs: cfg.reconnect_max_ms,
      },
    },
  );

  const commandContext = { prefix: config.matrix.command_prefix, api, identities, platform };
  bridge.attach((event) => handleCommand(event, commandContext));
  return bridge;
}

async function startApp(): Promise<RunningApp> {
  const config = loadConfig();
  ensureDataDirs(config);
  installConsoleFileLogging(config.logging.file ? createAppLogger(config.data_dir) : null, {
    level: config.logging.level,
    mirrorToStdout: config.logging.mirror_to_stdout,
    silence: config.logging.silence,
  });

  console.log(`Crossline starting as ${config.matrix.user_id} on ${config.matrix.homeserver}`);
  console.log(`Data directory: ${config.data_dir}`);

  const store = config.bridge ? createSqliteIdentityStore(config.bridge.identity_store_path) : null;
  const cache = config.bridge ? createAssetCache(config.bridge.avatar_cache_path) : null;
  const closeStores = (): void => {
    store?.close();
    cache?.close();
  };

  const platform = new MatrixChannel({
    homeserver: config.matrix.homeserver,
    userId: config.matrix.user_id,
    accessToken: config.matrix.access_token,
    syncTimeoutMs: config.matrix.sync_timeout_ms,
  });

  const bridge = store && cache ? wireBridge(config, platform, store, cache) : null;
  if (bridge) {
    platform.onReady(async () => bridge.start());
  } else {
    console.warn("No bridge configured, only the Matrix session will run.");
  }

  const heartbeat = config.heartbeat.url
    ? new HeartbeatPinger(config.heartbeat.url, config.heartbeat.interval_seconds)
    : null;

  try {
    await platform.start();
  } catch (err) {
    closeStores();
    throw err;
  }
  heartbeat?.start();

  console.log("Crossline ready!");

  let stopped = false;
  return {
    async stop(): Promise<void> {
      if (stopped) {
        return;
      }
      stopped = true;
      console.log("Shutting down...");
      await bridge?.stop();
      await platform.stop();
      await heartbeat?.stop();
      closeStores();
    },
  };
}

function asError(reason: unknown): Error {
  if (reason instanceof Error) {
    return reason;
  }
  return new Error(String(reason));
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

async function runWithSupervisor(): Promise<void> {
  const restartDelayMs = Number(process.env.CROSSLINE_RESTART_DELAY_MS ?? 2000);
  let shutdownRequested = false;
  let resolver: ((outcome: "shutdown" | "restart") => void) | null = null;

  const resolveOutcome = (outcome: "shutdown" | "restart"): void => {
    if (!resolver) {
      return;
    }
    const current = resolver;
    resolver = null;
    current(outcome);
  };

  const onSignal = (): void => {
    shutdownRequested = true;
    resolveOutcome("shutdown");
  };

  process.once("SIGINT", onSignal);
  process.once("SIGTERM", onSignal);

  while (!shutdownRequested) {
    let app: RunningApp | undefined;
    let fatalError: Error | undefined;
    try {
      app = await startApp();
    } catch (error) {
      fatalError = asError(error);
    }

    if (!app) {
      console.error("Fatal startup error:", fatalError);
      if (shutdownRequested) {
        break;
      }
      console.log(`Restarting in ${restartDelayMs}ms...`);
      await sleep(restartDelayMs);
      continue;
    }

    const onUncaughtException = (error: Error): void => {
      fatalError = error;
      resolveOutcome("restart");
    };
    const onUnhandledRejection = (reason: unknown): void => {
      fatalError = asError(reason);
      resolveOutcome("restart");
    };

    process.once("uncaughtException", onUncaughtException);
    process.once("unhandledRejection", onUnhandledRejection);

    const outcome = await new Promise<"shutdown" | "restart">((resolve) => {
      if (shutdownRequested) {
        resolve("shutdown");
        return;
      }
      resolver = resolve;
    });

    process.removeListener("uncaughtException", onUncaughtException);
    process.removeListener("unhandledRejection", onUnhandledRejection);

    await app.stop();

    if (outcome === "shutdown") {
      break;
    }

    console.error("Fatal runtime error:", fatalError);
    if (shutdownRequested) {
      break;
    }
    console.log(`Restarting in ${restartDelayMs}ms...`);
    await sleep(restartDelayMs);
  }

  process.removeListener("SIGINT", onSignal);
  process.removeListener("SIGTERM", onSignal);
}

runWithSupervisor().catch((error) => {
  console.error("Supervisor fatal error:", error);
  process.exit(1);
});
