/**
 * Debug Channels
 *
 * Targeted debug logging for following what the parser and the builders decide.
 *
 * ## Usage
 *
 * Enable via environment variable:
 * ```bash
 * URIKIT_DEBUG=parse npm test        # Just the grammar entry points
 * URIKIT_DEBUG=parse,codec npm test  # Multiple channels
 * URIKIT_DEBUG=* npm test            # Everything
 * ```
 *
 * In code (always present, no-op when disabled):
 * ```typescript
 * debug.parse("uri.failed", { input });
 * debug.codec("decode.invalid", { sequence });
 * ```
 */

/** Debug data can be any serializable value */
export type DebugData = Record<string, unknown>;

/** A debug channel function - logs when enabled, no-op when disabled */
export type DebugChannel = (point: string, data?: DebugData) => void;

export interface DebugConfig {
  /** Format output as JSON (machine-readable) or pretty (human-readable) */
  format: "json" | "pretty";
  /** Custom output function (defaults to console.log) */
  output: (message: string) => void;
}

let config: DebugConfig = { format: "pretty", output: console.log };

function parseDebugEnv(): Set<string> {
  const env = process.env["URIKIT_DEBUG"] ?? "";
  if (!env || env === "0" || env === "false") return new Set();
  if (env === "*" || env === "1" || env === "true") {
    return new Set(["*"]);
  }
  return new Set(env.split(",").map((s) => s.trim().toLowerCase()));
}

let enabledChannels = parseDebugEnv();

/** Channels created by name outside of this module (e.g. by the vfs package) */
const extraChannels = new Map<string, DebugChannel>();

function isEnabled(channel: string): boolean {
  return enabledChannels.has("*") || enabledChannels.has(channel.toLowerCase());
}

function formatMessage(channel: string, point: string, data: DebugData | undefined): string {
  if (config.format === "json") {
    return JSON.stringify({ channel, point, ...(data && { data }) });
  }

  const label = `[${channel}.${point}]`;
  if (!data || Object.keys(data).length === 0) return label;
  const parts = Object.entries(data).map(([key, value]) => `${key}=${formatValue(value)}`);
  return `${label} { ${parts.join(", ")} }`;
}

function formatValue(value: unknown): string {
  if (typeof value === "string") return `"${value}"`;
  if (typeof value === "number" || typeof value === "boolean" || value === null || value === undefined) {
    return String(value);
  }
  return JSON.stringify(value);
}

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
  if (!key) return noop;
  if (!extraChannels.has(key)) extraChannels.set(key, createChannel(key));
  // Looked up per call so a later refresh reaches callers that captured the channel.
  return (point, data) => {
    (extraChannels.get(key) ?? noop)(point, data);
  };
}

function noop(): void {}

/**
 * Re-read URIKIT_DEBUG and rebuild every channel.
 */
export function refreshDebugChannels(): void {
  enabledChannels = parseDebugEnv();
  debug.parse = createChannel("parse");
  debug.codec = createChannel("codec");
  debug.build = createChannel("build");
  for (const name of extraChannels.keys()) {
    extraChannels.set(name, createChannel(name));
  }
}

export function configureDebug(options: Partial<DebugConfig>): void {
  config = { ...config, ...options };
}

/** Check whether a channel (or any channel) is enabled. */
export function isDebugEnabled(channel?: string): boolean {
  if (channel) return isEnabled(channel);
  return enabledChannels.size > 0;
}

export const debug = {
  /** Grammar entry points and failed productions */
  parse: createChannel("parse"),

  /** Percent encoding/decoding */
  codec: createChannel("codec"),

  /** Parsed view -> builder conversion */
  build: createChannel("build"),
};
