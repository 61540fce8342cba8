import os from "node:os";
import path from "node:path";

/**
 * Expand `$VAR` / `${VAR}` and a leading `~`, then resolve to an absolute
 * path. Unknown variables expand to nothing.
 */
export function resolveUserPath(
  input: string,
  env: NodeJS.ProcessEnv = process.env,
  homedir: () => string = os.homedir,
): string {
  const trimmed = input.trim();
  if (!trimmed) return trimmed;
  const expanded = trimmed.replace(
    /\$\{([A-Za-z_][A-Za-z0-9_]*)\}|\$([A-Za-z_][A-Za-z0-9_]*)/g,
    (_match, braced: string | undefined, bare: string | undefined) => env[braced ?? bare ?? ""] ?? "",
  );
  if (expanded === "~") return homedir();
  if (expanded.startsWith("~/")) return path.resolve(homedir(), expanded.slice(2));
  return path.resolve(expanded);
}

/** `"a, b,,c"` → `["a", "b", "c"]`. */
export function splitList(value: string | undefined, options: { lowercase?: boolean } = {}): string[] {
  if (!value) return [];
  return value
    .split(",")
    .map((part) => (options.lowercase ? part.trim().toLowerCase() : part.trim()))
    .filter((part) => part.length > 0);
}

/**
 * Map with at most `limit` calls in flight. Results keep input order.
 */
export async function mapWithConcurrency<T, R>(
  items: readonly T[],
  limit: number,
  fn: (item: T, index: number) => Promise<R>,
): Promise<R[]> {
  const results = new Array<R>(items.length);
  let next = 0;
  const worker = async () => {
    while (next < items.length) {
      const index = next++;
      results[index] = await fn(items[index], index);
    }
  };
  const workers = Array.from({ length: Math.max(1, Math.min(limit, items.length)) }, () => worker());
  await Promise.all(workers);
  return results;
}

export function formatDuration(seconds: number): string {
  const h = Math.floor(seconds / 3600);
  const m = Math.floor((seconds % 3600) / 60);
  const s = seconds % 60;
  return `${h}:${String(m).padStart(2, "0")}:${String(s).padStart(2, "0")}`;
}
