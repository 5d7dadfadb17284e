/**
 * Debug Channels
 *
 * Targeted debug logging for route definition. Each package logs through a
 * named channel so a single subsystem can be traced without touching code.
 *
 * ## Usage
 *
 * Enable via environment variable:
 * ```bash
 * LIVEROUTE_DEBUG=live npm test          # Just the live route compiler
 * LIVEROUTE_DEBUG=live,router npm test   # Multiple channels
 * LIVEROUTE_DEBUG=* npm test             # Everything
 * ```
 *
 * In code (always present, zero-cost when disabled):
 * ```typescript
 * debug.live("inferred.helper", { view, action, helper });
 * debug.router("route.added", { verb, path, helper });
 * ```
 */

/** Debug data can be any serializable value */
export type DebugData = Record<string, unknown>;

/** A debug channel function - logs when enabled, no-op when disabled */
export type DebugChannel = (point: string, data?: DebugData) => void;

/** Configuration for debug output */
export interface DebugConfig {
  /** Format output as JSON (machine-readable) or pretty (human-readable) */
  format: "json" | "pretty";
  /** Include timestamps in output */
  timestamps: boolean;
  /** Custom output function (defaults to console.log) */
  output: (message: string) => void;
}

export const DEBUG_ENV_VAR = "LIVEROUTE_DEBUG";

const DEFAULT_CONFIG: DebugConfig = {
  format: "pretty",
  timestamps: false,
  output: console.log,
};

let config: DebugConfig = { ...DEFAULT_CONFIG };

function parseDebugEnv(): Set<string> {
  const env = process.env[DEBUG_ENV_VAR] ?? "";
  if (!env || env === "0" || env === "false") return new Set();
  if (env === "*" || env === "1" || env === "true") {
    return new Set(["*"]);
  }
  return new Set(env.split(",").map((s) => s.trim().toLowerCase()));
}

let enabledChannels = parseDebugEnv();

/** Additional channels created outside of this module */
const extraChannels = new Map<string, DebugChannel>();

function isEnabled(channel: string): boolean {
  return enabledChannels.has("*") || enabledChannels.has(channel.toLowerCase());
}

function isRecord(value: unknown): value is DebugData {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function formatMessage(
  channel: string,
  point: string,
  data: DebugData | undefined,
): string {
  const prefix = config.timestamps
    ? `[${new Date().toISOString()}] `
    : "";

  if (config.format === "json") {
    return JSON.stringify({
      channel,
      point,
      ...(data && { data }),
      ...(config.timestamps && { timestamp: Date.now() }),
    });
  }

  const label = `[${channel}.${point}]`;
  if (!data || Object.keys(data).length === 0) {
    return `${prefix}${label}`;
  }
  return `${prefix}${label} ${formatData(data)}`;
}

function formatData(data: DebugData, depth = 0): string {
  const entries = Object.entries(data);
  if (entries.length === 0) return "{}";

  const parts: string[] = [];
  for (const [key, value] of entries) {
    parts.push(`${key}=${formatValue(value, depth)}`);
  }

  const inline = `{ ${parts.join(", ")} }`;
  if (inline.length <= 100 || depth > 0) return inline;
  return `{\n  ${parts.join(",\n  ")}\n}`;
}

function formatValue(value: unknown, depth: number): string {
  if (value === null) return "null";
  if (value === undefined) return "undefined";
  if (typeof value === "string") {
    if (value.length > 60) return `"${value.slice(0, 57)}..."`;
    return `"${value}"`;
  }
  if (typeof value === "number" || typeof value === "boolean") {
    return String(value);
  }
  if (Array.isArray(value)) {
    if (value.length === 0) return "[]";
    if (value.length <= 3 && depth < 2) {
      const items = value.map((v) => formatValue(v, depth + 1));
      const inline = `[${items.join(", ")}]`;
      if (inline.length <= 50) return inline;
    }
    return `[${value.length} items]`;
  }
  if (isRecord(value)) {
    return depth < 1 ? formatData(value, depth + 1) : "{...}";
  }
  try {
    return JSON.stringify(value) ?? String(value);
  } catch {
    return "[unserializable]";
  }
}

/**
 * Create a debug channel.
 *
 * Enablement is checked at creation time, so a disabled channel is a no-op.
 */
function createChannel(name: string): DebugChannel {
  if (!isEnabled(name)) {
    return () => {};
  }

  return (point: string, data?: DebugData) => {
    config.output(formatMessage(name, point, data));
  };
}

/**
 * Get or create an extra debug channel by name.
 * Channels are refreshed when refreshDebugChannels() is called.
 */
export function getDebugChannel(name: string): DebugChannel {
  const key = name.trim().toLowerCase();
  if (!key) return () => {};
  const existing = extraChannels.get(key);
  if (existing) return existing;
  const channel = createChannel(key);
  extraChannels.set(key, channel);
  return channel;
}

/**
 * Re-read LIVEROUTE_DEBUG and recreate every channel.
 */
export function refreshDebugChannels(): void {
  enabledChannels = parseDebugEnv();
  debug.router = createChannel("router");
  debug.live = createChannel("live");
  for (const name of extraChannels.keys()) {
    extraChannels.set(name, createChannel(name));
  }
}

export function configureDebug(options: Partial<DebugConfig>): void {
  config = { ...config, ...options };
}

/**
 * Check if a debug channel (or any channel) is enabled.
 */
export function isDebugEnabled(channel?: string): boolean {
  if (channel) return isEnabled(channel);
  return enabledChannels.size > 0;
}

/**
 * Debug channels for each subsystem.
 */
export const debug = {
  /** Host router (scopes, pipelines, route table) */
  router: createChannel("router"),

  /** Live route compiler (inference, descriptors, emission) */
  live: createChannel("live"),
};

export type Debug = typeof debug;
