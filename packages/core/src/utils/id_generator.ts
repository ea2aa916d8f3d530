import { randomBytes } from "crypto";

/**
 * Sanitizes a string to be used in an ID slug.
 * Converts to lower-case, turns spaces, dots and underscores into hyphens
 * and removes anything else outside [a-z0-9-].
 */
export function sanitizeForId(name: string): string {
  return name
    .toLowerCase()
    .replace(/[\s._]+/g, "-")
    .replace(/[^a-z0-9-]/g, "")
    .slice(0, 50); // Ensure slug is not too long
}

function randomSuffix(): string {
  return randomBytes(4).toString("hex");
}

/**
 * Generates a Task ID (e.g., '1716900000000-task-echo-run-9f2c01ab').
 * The random suffix keeps ids unique for tasks created in the same millisecond.
 */
export function generateTaskId(name: string, timestamp: number = Date.now(), suffix: string = randomSuffix()): string {
  const slug = sanitizeForId(name) || "task";
  return `${timestamp}-task-${slug}-${suffix}`;
}

/**
 * Generates a Session ID (e.g., '1716900000000-session-cli-9f2c01ab').
 */
export function generateSessionId(label: string = "cli", timestamp: number = Date.now(), suffix: string = randomSuffix()): string {
  const slug = sanitizeForId(label) || "session";
  return `${timestamp}-session-${slug}-${suffix}`;
}
