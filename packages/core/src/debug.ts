/**
 * Debug Channels
 *
 * Off by default. `LOCALIZED_DOCS_DEBUG` takes a comma-separated list of
 * channel names, or `*` for all of them:
 * ```bash
 * LOCALIZED_DOCS_DEBUG=resolve,collect npm test
 * ```
 */

export type DebugData = Record<string, unknown>;

/** Logs when its channel is enabled, no-op otherwise */
export type DebugChannel = (point: string, data?: DebugData) => void;

export interface DebugConfig {
  /** "pretty" for people, "json" for one object per line */
  format: "json" | "pretty";
  /** Defaults to console.log */
  output: (message: string) => void;
}

type ChannelName = "resolve" | "collect" | "discover" | "config";

let config: DebugConfig = { format: "pretty", output: console.log };

function readEnabledChannels(): Set<string> {
  const env = process.env["LOCALIZED_DOCS_DEBUG"] ?? "";
  if (!env || env === "0" || env === "false") return new Set();
  return new Set(env.split(",").map((s) => s.trim().toLowerCase()));
}

let enabledChannels = readEnabledChannels();

function formatMessage(channel: ChannelName, point: string, data: DebugData | undefined): string {
  if (config.format === "json") {
    return JSON.stringify({ channel, point, ...(data && { data }) });
  }
  const label = `[${channel}.${point}]`;
  if (!data || Object.keys(data).length === 0) return label;
  const fields = Object.entries(data).map(
    ([key, value]) => `${key}=${typeof value === "string" ? `"${value}"` : JSON.stringify(value)}`,
  );
  return `${label} { ${fields.join(", ")} }`;
}

// Enablement is read once per channel; refreshDebugChannels() re-reads it.
function createChannel(name: ChannelName): DebugChannel {
  if (!enabledChannels.has("*") && !enabledChannels.has(name)) {
    return () => {};
  }
  return (point, data) => {
    config.output(formatMessage(name, point, data));
  };
}

/**
 * Re-read LOCALIZED_DOCS_DEBUG and recreate every channel.
 */
export function refreshDebugChannels(): void {
  enabledChannels = readEnabledChannels();
  debug.resolve = createChannel("resolve");
  debug.collect = createChannel("collect");
  debug.discover = createChannel("discover");
  debug.config = createChannel("config");
}

export function configureDebug(options: Partial<DebugConfig>): void {
  config = { ...config, ...options };
}

export const debug: Record<ChannelName, DebugChannel> = {
  /** Candidate search, missing translations, destination synthesis */
  resolve: createChannel("resolve"),
  /** Dropped duplicates and lookup misses */
  collect: createChannel("collect"),
  /** Docs tree walking */
  discover: createChannel("discover"),
  /** Option normalization */
  config: createChannel("config"),
};
