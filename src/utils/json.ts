import type { MigratedEntry } from '../types/argocd.js';

/**
 * Serialize entries the way they are written to disk: two-space indent,
 * trailing newline.
 */
export function entriesToJson(entries: MigratedEntry[] | MigratedEntry): string {
  return `${JSON.stringify(entries, null, 2)}\n`;
}
