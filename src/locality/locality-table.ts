import { readFileSync } from "node:fs";
import { z } from "zod";

export const UNKNOWN_LOCALITY = "Undefined";

const DEFAULT_TABLE_URL = new URL("../../data/localities.json", import.meta.url);

const tableSchema = z.record(z.string().regex(/^\d+$/), z.string().min(1));

/**
 * Read-only map from agreement id prefixes to locality names. Longer prefixes
 * take precedence, so "481" wins over "48" for "4815".
 */
export class LocalityTable {
  private readonly entries: ReadonlyArray<readonly [string, string]>;

  constructor(prefixes: Readonly<Record<string, string>>) {
    this.entries = Object.entries(prefixes).sort(([left], [right]) => right.length - left.length);
  }

  get size(): number {
    return this.entries.length;
  }

  resolve(agreementId: string): string {
    for (const [prefix, locality] of this.entries) {
      if (agreementId.startsWith(prefix)) {
        return locality;
      }
    }
    return UNKNOWN_LOCALITY;
  }
}

export function loadLocalityTable(path: string | URL = DEFAULT_TABLE_URL): LocalityTable {
  const raw = readFileSync(path, "utf-8");
  const parsed = tableSchema.safeParse(JSON.parse(raw));
  if (!parsed.success) {
    throw new Error(`Invalid locality table in ${String(path)}: ${parsed.error.issues[0]?.message ?? "unknown error"}`);
  }
  return new LocalityTable(parsed.data);
}
