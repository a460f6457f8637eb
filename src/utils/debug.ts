// Lightweight, opt-in debug logging for the engine and its tests

// Topics are enabled through the BLOCKFALL_DEBUG environment variable:
// "true", "1", "on" or "*" enable every topic; otherwise a comma list of
// topics, e.g. BLOCKFALL_DEBUG=session,control,config

export type DebugTopic = "config" | "control" | "engine" | "loop" | "session";

function readEnvTopics(): ReadonlyArray<string> {
  const raw = process.env["BLOCKFALL_DEBUG"];
  if (raw === undefined) return [];
  const v = raw.trim().toLowerCase();
  if (v === "" || v === "0" || v === "false" || v === "off") return [];
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
