// Lightweight, opt-in debug logging for the engine and its tests

// Topics can be enabled via:
// - the TICKFRAME_DEBUG environment variable: "true", "1", "on", "*" or a comma list of topics
//   e.g. TICKFRAME_DEBUG=loop,render node game.js
// - setDebugTopics(["scene"]) at runtime (takes precedence until reset with null)

export type DebugTopic =
  | "loop"
  | "render"
  | "input"
  | "scene"
  | "audio"
  | "assets"
  | "config";

const ENV_KEY = "TICKFRAME_DEBUG";

let overrideTopics: ReadonlyArray<string> | null = null;

function parseTopics(raw: string | undefined): ReadonlyArray<string> {
  if (raw === undefined) return [];
  const v = raw.trim().toLowerCase();
  if (v === "1" || v === "true" || v === "on" || v === "*") return ["*"];
  return v
    .split(",")
    .map((s) => s.trim())
    .filter((s) => s.length > 0);
}

function readEnvTopics(): ReadonlyArray<string> {
  return parseTopics(process.env[ENV_KEY]);
}

/** Replace the environment-derived topics; pass null to fall back to the environment again. */
export function setDebugTopics(
  topics: ReadonlyArray<DebugTopic | "*"> | null,
): void {
  overrideTopics = topics === null ? null : [...topics];
}

export function isDebugEnabled(topic?: DebugTopic): boolean {
  const topics = overrideTopics ?? readEnvTopics();
  if (topics.length === 0) return false;
  if (topics.includes("*")) return true;
  if (topic !== undefined) return topics.includes(topic);
  return true;
}

export function debugLog(
  topic: DebugTopic,
  message: string,
  data?: unknown,
): void {
  if (!isDebugEnabled(topic)) return;
  if (data !== undefined) {
    console.warn(`[DBG:${topic}] ${message}`, data);
  } else {
    console.warn(`[DBG:${topic}] ${message}`);
  }
}
