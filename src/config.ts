/**
 * Config loading and validation.
 *
 * Loads config.yml from the data directory, substitutes ${ENV_VAR} references,
 * applies defaults, and validates required fields at startup so
 * misconfigurations fail early.
 */

import fs from "node:fs";
import path from "node:path";
import { parse as parseYaml } from "yaml";
import { ConfigError } from "./bridge/errors.js";
import { LOG_LEVELS, type LogLevel } from "./logger.js";

export interface MatrixConfig {
  homeserver: string;
  user_id: string;
  access_token: string;
  command_prefix: string;
  sync_timeout_ms: number;
}

export interface BridgeConfig {
  websocket_endpoint: string;
  bridge_endpoint: string;
  token: string;
  /** Local room that mirrors the remote channel. */
  room_id: string;
  guild_id: string | null;
  /** Primary send path. Without it every message takes the bridge service. */
  webhook_url: string | null;
  webhook_wait: boolean;
  /** Remote author name of the companion bot; its messages are not relayed back. */
  self_author: string | null;
  remote_api_base: string;
  grouping_window_seconds: number;
  avatar_cache_path: string;
  identity_store_path: string;
  ignored_prefixes: string[];
  video_embed_prefix: string;
  max_upload_bytes: number | null;
  thumbnail_threshold_bytes: number;
  user_cache_ttl_seconds: number;
  reconnect_base_ms: number;
  reconnect_max_ms: number;
  ffmpeg_path: string;
}

export interface LoggingConfig {
  level: LogLevel;
  /** Write JSONL files under <data_dir>/logs. */
  file: boolean;
  mirror_to_stdout: boolean;
  /** Console tags cut to errors only. */
  silence: string[];
}

export interface HeartbeatConfig {
  /** Uptime monitor push URL. Empty disables the pinger. */
  url: string;
  interval_seconds: number;
}

export interface Config {
  matrix: MatrixConfig;
  /** Null when the config has no bridge section. */
  bridge: BridgeConfig | null;
  logging: LoggingConfig;
  heartbeat: HeartbeatConfig;
  data_dir: string;
}

/**
 * Replace ${VAR} references with values from process.env.
 */
function substituteEnvVars(text: string): string {
  // Only uppercase env-style names, so a literal "${name}" in a prefix survives.
  return text.replace(/\$\{([A-Z_][A-Z0-9_]*)\}/g, (_match, varName: string) => {
    const value = process.env[varName];
    if (value === undefined) {
      throw new ConfigError(`Environment variable ${varName} is not set`);
    }
    return value;
  });
}

/**
 * Recursively substitute env vars in all string values of an object.
 */
function substituteDeep(obj: unknown): unknown {
  if (typeof obj === "string") {
    return substituteEnvVars(obj);
  }
  if (Array.isArray(obj)) {
    return obj.map(substituteDeep);
  }
  if (obj !== null && typeof obj === "object") {
    const result: Record<string, unknown> = {};
    for (const [key, value] of Object.entries(obj)) {
      result[key] = substituteDeep(value);
    }
    return result;
  }
  return obj;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Typed reads from one YAML mapping. Wrong types are reported as errors
 * under their dotted path and replaced by the fallback.
 *
 * Integers arrive as bigint (the YAML parser runs with intAsBigInt) so that
 * snowflake IDs written without quotes keep every digit.
 */
class Section {
  constructor(
    private readonly raw: Record<string, unknown>,
    private readonly name: string,
    private readonly errors: string[],
  ) {}

  private invalid(key: string, expected: string): void {
    this.errors.push(`${this.name}.${key} must be ${expected}`);
  }

  string(key: string, fallback = ""): string {
    return this.optionalString(key) ?? fallback;
  }

  optionalString(key: string): string | null {
    const value = this.raw[key];
    if (value === undefined || value === null) return null;
    if (typeof value === "string") return value;
    if (typeof value === "number" || typeof value === "bigint") return String(value);
    this.invalid(key, "a string");
    return null;
  }

  number(key: string, fallback: number): number {
    return this.optionalNumber(key) ?? fallback;
  }

  optionalNumber(key: string): number | null {
    const value = this.raw[key];
    if (value === undefined || value === null) return null;
    if (typeof value === "bigint") return Number(value);
    if (typeof value === "number" && Number.isFinite(value)) return value;
    if (typeof value === "string" && value.trim() && Number.isFinite(Number(value))) return Number(value);
    this.invalid(key, "a number");
    return null;
  }

  boolean(key: string, fallback: boolean): boolean {
    const value = this.raw[key];
    if (value === undefined || value === null) return fallback;
    if (typeof value === "boolean") return value;
    if (value === "true" || value === "false") return value === "true";
    this.invalid(key, "true or false");
    return fallback;
  }

  stringList(key: string, fallback: string[]): string[] {
    const value = this.raw[key];
    if (value === undefined || value === null) return fallback;
    if (Array.isArray(value)) return value.map(String);
    this.invalid(key, "a list of strings");
    return fallback;
  }
}

function section(root: Record<string, unknown>, name: string, errors: string[]): Section | null {
  const raw = root[name];
  if (raw === undefined || raw === null) return null;
  if (!isRecord(raw)) {
    errors.push(`${name} must be a mapping`);
    return null;
  }
  return new Section(raw, name, errors);
}

const EMPTY = new Section({}, "", []);

function bridgeFromConfig(s: Section, dataDir: string): BridgeConfig {
  return {
    websocket_endpoint: s.string("websocket_endpoint"),
    bridge_endpoint: s.string("bridge_endpoint").replace(/\/+$/, ""),
    token: s.string("token"),
    room_id: s.string("room_id"),
    guild_id: s.optionalString("guild_id") || null,
    webhook_url: s.optionalString("webhook_url") || null,
    webhook_wait: s.boolean("webhook_wait", true),
    self_author: s.optionalString("self_author") || null,
    remote_api_base: s.string("remote_api_base", "https://discord.com/api/v10").replace(/\/+$/, ""),
    grouping_window_seconds: s.number("grouping_window_seconds", 300),
    avatar_cache_path: path.resolve(dataDir, s.string("avatar_cache_path", "avatars.db")),
    identity_store_path: path.resolve(dataDir, s.string("identity_store_path", "identity.db")),
    ignored_prefixes: s.stringList("ignored_prefixes", ["!", "?", ".", "-"]),
    video_embed_prefix: s.string("video_embed_prefix"),
    max_upload_bytes: s.optionalNumber("max_upload_bytes"),
    thumbnail_threshold_bytes: s.number("thumbnail_threshold_bytes", 512 * 1024),
    user_cache_ttl_seconds: s.number("user_cache_ttl_seconds", 24 * 60 * 60),
    reconnect_base_ms: s.number("reconnect_base_ms", 5000),
    reconnect_max_ms: s.number("reconnect_max_ms", 60_000),
    ffmpeg_path: s.string("ffmpeg_path", "ffmpeg"),
  };
}

/**
 * Build a Config from YAML text. Throws ConfigError listing every problem.
 */
export function parseConfig(text: string, dataDir: string): Config {
  const parsed: unknown = parseYaml(text, { intAsBigInt: true });
  const substituted = substituteDeep(parsed ?? {});
  if (!isRecord(substituted)) {
    throw new ConfigError("Config errors:\n  - config must be a mapping");
  }

  const errors: string[] = [];
  const matrix = section(substituted, "matrix", errors);
  const bridge = section(substituted, "bridge", errors);
  const logging = section(substituted, "logging", errors) ?? EMPTY;
  const heartbeat = section(substituted, "heartbeat", errors) ?? EMPTY;
  if (!matrix) errors.push("matrix section is required");
  const m = matrix ?? EMPTY;

  const level = logging.string("level", "info");
  const logLevel = LOG_LEVELS.find((l) => l === level);
  if (!logLevel) errors.push(`logging.level must be one of ${LOG_LEVELS.join(", ")}`);

  const config: Config = {
    matrix: {
      homeserver: m.string("homeserver").replace(/\/+$/, ""),
      user_id: m.string("user_id"),
      access_token: m.string("access_token"),
      command_prefix: m.string("command_prefix", "!"),
      sync_timeout_ms: m.number("sync_timeout_ms", 30_000),
    },
    bridge: bridge ? bridgeFromConfig(bridge, dataDir) : null,
    logging: {
      level: logLevel ?? "info",
      file: logging.boolean("file", true),
      mirror_to_stdout: logging.boolean("mirror_to_stdout", true),
      silence: logging.stringList("silence", []),
    },
    heartbeat: {
      url: heartbeat.string("url"),
      interval_seconds: heartbeat.number("interval_seconds", 60),
    },
    data_dir: dataDir,
  };

  validateConfig(config, errors);
  return config;
}

export function loadConfig(configPath?: string): Config {
  const dataDir = path.resolve(process.env.CROSSLINE_DATA_DIR || "./data");
  const cfgPath = configPath || path.join(dataDir, "config.yml");

  if (!fs.existsSync(cfgPath)) {
    throw new ConfigError(`Config file not found: ${cfgPath}`);
  }

  return parseConfig(fs.readFileSync(cfgPath, "utf-8"), dataDir);
}

function isUrl(value: string, protocols: string[]): boolean {
  try {
    return protocols.includes(new URL(value).protocol);
  } catch {
    return false;
  }
}

/**
 * Validate config at startup so a bad value fails now, not on the first
 * relayed message.
 */
function validateConfig(config: Config, errors: string[]): void {
  const warnings: string[] = [];
  const { matrix, bridge, heartbeat } = config;

  // --- Matrix ---

  if (!isUrl(matrix.homeserver, ["http:", "https:"])) {
    errors.push("matrix.homeserver must be an http(s) URL");
  }
  if (!/^@[^:]+:.+$/.test(matrix.user_id)) {
    errors.push(`matrix.user_id must look like @name:server (got "${matrix.user_id}")`);
  }
  if (!matrix.access_token) {
    errors.push("matrix.access_token is required");
  }
  if (matrix.sync_timeout_ms < 0) {
    errors.push("matrix.sync_timeout_ms must not be negative");
  }

  // --- Bridge ---

  if (!bridge) {
    warnings.push("no bridge section; nothing will be relayed");
  } else {
    if (!isUrl(bridge.websocket_endpoint, ["ws:", "wss:"])) {
      errors.push("bridge.websocket_endpoint must be a ws(s) URL");
    }
    if (!isUrl(bridge.bridge_endpoint, ["http:", "https:"])) {
      errors.push("bridge.bridge_endpoint must be an http(s) URL");
    }
    if (!bridge.token) {
      errors.push("bridge.token is required");
    }
    if (!bridge.room_id.startsWith("!")) {
      errors.push(`bridge.room_id must be a room ID starting with "!" (got "${bridge.room_id}")`);
    }
    if (bridge.webhook_url && !isUrl(bridge.webhook_url, ["http:", "https:"])) {
      errors.push("bridge.webhook_url must be an http(s) URL");
    }
    if (bridge.reconnect_base_ms <= 0 || bridge.reconnect_max_ms < bridge.reconnect_base_ms) {
      errors.push("bridge.reconnect_base_ms must be positive and not above reconnect_max_ms");
    }
    if (bridge.max_upload_bytes !== null && bridge.max_upload_bytes <= 0) {
      errors.push("bridge.max_upload_bytes must be positive");
    }
    if (!bridge.webhook_url) {
      warnings.push("bridge.webhook_url is not set; local messages go out under the bridge service's name");
    }
    if (!bridge.self_author) {
      warnings.push("bridge.self_author is not set; the companion bot's own messages may echo back");
    }
  }

  // --- Heartbeat ---

  if (heartbeat.url && !isUrl(heartbeat.url, ["http:", "https:"])) {
    errors.push("heartbeat.url must be an http(s) URL");
  }
  if (heartbeat.interval_seconds <= 0) {
    errors.push("heartbeat.interval_seconds must be positive");
  }

  // --- Emit ---

  for (const w of warnings) {
    console.warn(`Config warning: ${w}`);
  }
  if (errors.length > 0) {
    throw new ConfigError(`Config errors:\n  - ${errors.join("\n  - ")}`);
  }
}

/**
 * Ensure data directories exist.
 */
export function ensureDataDirs(config: Config): void {
  const dirs = [config.data_dir, path.join(config.data_dir, "logs")];
  if (config.bridge) {
    dirs.push(path.dirname(config.bridge.identity_store_path), path.dirname(config.bridge.avatar_cache_path));
  }
  for (const dir of dirs) {
    fs.mkdirSync(dir, { recursive: true });
  }
}
