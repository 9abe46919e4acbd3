import os from "node:os";
import path from "node:path";

export function normalizeInputPath(inputPath: string, homeDir = os.homedir()): string {
  const trimmed = inputPath.trim();
  if (trimmed === "~") {
    return homeDir;
  }
  if (trimmed.startsWith("~/")) {
    return path.join(homeDir, trimmed.slice(2));
  }
  return trimmed;
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

export function parseMaybeNumber(value: unknown): number | undefined {
  if (typeof value === "number") {
    return Number.isFinite(value) ? value : undefined;
  }
  if (typeof value === "string" && value.trim() !== "") {
    const parsed = Number(value);
    return Number.isFinite(parsed) ? parsed : undefined;
  }
  return undefined;
}

/**
 * Compares dotted numeric versions ("24.04" vs "22.10", "42" vs "9").
 * Non-numeric segments fall back to string order.
 */
export function compareVersions(a: string, b: string): number {
  const left = a.split(".");
  const right = b.split(".");
  const length = Math.max(left.length, right.length);
  for (let idx = 0; idx < length; idx++) {
    const l = left[idx] ?? "0";
    const r = right[idx] ?? "0";
    const ln = Number(l);
    const rn = Number(r);
    if (Number.isFinite(ln) && Number.isFinite(rn)) {
      if (ln !== rn) {
        return ln < rn ? -1 : 1;
      }
      continue;
    }
    const cmp = l.localeCompare(r);
    if (cmp !== 0) {
      return cmp;
    }
  }
  return 0;
}

export async function sleep(ms: number): Promise<void> {
  await new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Maps items through `worker` with at most `limit` calls in flight. Results
 * keep input order. A rejected worker rejects the whole call, so workers that
 * must not cancel their siblings should settle to a value instead.
 */
export async function mapWithConcurrency<T, R>(
  items: readonly T[],
  limit: number,
  worker: (item: T, index: number) => Promise<R>
): Promise<R[]> {
  const results = new Array<R>(items.length);
  const width = Math.max(1, Math.min(Math.floor(limit) || 1, items.length));
  let next = 0;

  const lanes = Array.from({ length: width }, async () => {
    while (next < items.length) {
      const index = next++;
      results[index] = await worker(items[index], index);
    }
  });

  await Promise.all(lanes);
  return results;
}
