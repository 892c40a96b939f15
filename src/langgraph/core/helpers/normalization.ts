const YES = new Set(["sim", "s", "yes", "y", "true", "1"]);
const NO = new Set(["não", "nao", "n", "no", "false", "0"]);

/** Interprets chat-style yes/no answers; null when the answer is neither. */
export function parseYesNo(value: unknown): boolean | null {
  if (typeof value === "boolean") return value;
  if (typeof value !== "string") return null;
  const key = value.trim().toLowerCase();
  if (YES.has(key)) return true;
  if (NO.has(key)) return false;
  return null;
}
