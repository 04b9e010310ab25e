// Opt-in debug logging for the CLI and tests

// Topics are enabled through the BLOCKFALL_DEBUG environment variable:
// "true", "1" or "on" enable every topic; otherwise a comma list of topics,
//   e.g. BLOCKFALL_DEBUG=session,input blockfall play
// Output goes to stderr so it never lands inside a rendered frame.

export type DebugTopic = "session" | "input" | "replay" | "settings";

export const DEBUG_ENV_VAR = "BLOCKFALL_DEBUG";

function readEnvTopics(): ReadonlyArray<string> {
  const raw = process.env[DEBUG_ENV_VAR];
  if (raw === undefined) return [];
  const v = raw.trim().toLowerCase();
  if (v === "1" || v === "true" || v === "on") return ["*"];
  return v
    .split(",")
    .map((s) => s.trim())
    .filter((s) => s.length > 0);
}

export function isDebugEnabled(topic?: DebugTopic): boolean {
  const topics = readEnvTopics();
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
