/**
 * Debug channels.
 *
 * Opt-in tracing of what the pipeline decided: names registered, references
 * linked, rules run. Diagnostics never go through here; they are data.
 *
 * Channels are picked with the ITL_DEBUG environment variable:
 * ```bash
 * ITL_DEBUG=build npm test           # one channel
 * ITL_DEBUG=build,validate npm test  # several
 * ITL_DEBUG=* npm test               # all of them
 * ```
 *
 * A disabled channel is a no-op function, so call sites stay in place:
 * ```typescript
 * debug.build("register", { name, id });
 * ```
 */

export type DebugData = Record<string, unknown>;

export type DebugChannel = (point: string, data?: DebugData) => void;

export interface DebugConfig {
  /** `pretty` for people, `json` for one object per line. */
  format: "json" | "pretty";
  /** Where lines go. The language server points this at its console, since stdout carries the protocol. */
  output: (message: string) => void;
}

let config: DebugConfig = { format: "pretty", output: console.log };
let enabled = readEnv();

function readEnv(): ReadonlySet<string> {
  const raw = (process.env["ITL_DEBUG"] ?? "").trim();
  if (raw === "" || raw === "0" || raw === "false") return new Set();
  if (raw === "*" || raw === "1" || raw === "true") return new Set(["*"]);
  return new Set(
    raw
      .split(",")
      .map((s) => s.trim().toLowerCase())
      .filter(Boolean),
  );
}

export function isDebugEnabled(channel?: string): boolean {
  if (channel === undefined) return enabled.size > 0;
  return enabled.has("*") || enabled.has(channel.toLowerCase());
}

function render(channel: string, point: string, data: DebugData | undefined): string {
  if (config.format === "json") {
    return JSON.stringify({ channel, point, ...(data && { data }) }, (_key, value: unknown) =>
      typeof value === "bigint" ? value.toString() : value,
    );
  }
  const label = `[${channel}.${point}]`;
  const entries = data ? Object.entries(data) : [];
  if (entries.length === 0) return label;
  const parts = entries.map(([key, value]) => `${key}=${renderValue(value, 0)}`);
  const line = `{ ${parts.join(", ")} }`;
  return line.length <= 100 ? `${label} ${line}` : `${label} {\n  ${parts.join(",\n  ")}\n}`;
}

function renderValue(value: unknown, depth: number): string {
  switch (typeof value) {
    case "string":
      return value.length > 60 ? `"${value.slice(0, 57)}..."` : `"${value}"`;
    case "bigint":
      return `${value}n`;
    case "number":
    case "boolean":
    case "undefined":
      return String(value);
    case "object":
      break;
    default:
      return typeof value;
  }
  if (value === null) return "null";
  if (Array.isArray(value)) {
    if (value.length === 0) return "[]";
    if (value.length <= 3 && depth < 2) {
      const inline = `[${value.map((v) => renderValue(v, depth + 1)).join(", ")}]`;
      if (inline.length <= 50) return inline;
    }
    return `[${value.length} items]`;
  }
  // Type definitions and AST nodes read better by name or kind than in full.
  const name: unknown = Reflect.get(value, "name");
  if (typeof name === "string") return `<${name}>`;
  const kind: unknown = Reflect.get(value, "kind");
  if (typeof kind === "string") return `<${kind}>`;
  if (depth > 0) return "{...}";
  const inner = Object.entries(value).map(([k, v]) => `${k}=${renderValue(v, depth + 1)}`);
  return `{ ${inner.join(", ")} }`;
}

function channel(name: string): DebugChannel {
  if (!isDebugEnabled(name)) return () => {};
  return (point, data) => config.output(render(name, point, data));
}

function createChannels() {
  return {
    parse: channel("parse"),
    build: channel("build"),
    validate: channel("validate"),
    pipeline: channel("pipeline"),
    server: channel("server"),
  };
}

/** One channel per pipeline stage, plus the language server's. */
export const debug: Record<keyof ReturnType<typeof createChannels>, DebugChannel> = createChannels();

export type Debug = typeof debug;

/** Re-read ITL_DEBUG and rebuild the channels in place. */
export function refreshDebugChannels(): void {
  enabled = readEnv();
  Object.assign(debug, createChannels());
}

export function configureDebug(options: Partial<DebugConfig>): void {
  config = { ...config, ...options };
}
