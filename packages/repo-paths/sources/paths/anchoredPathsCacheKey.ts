import { createHash } from "node:crypto";

import type { AnchoredPathRef } from "./anchoredPath.js";

/**
 * Derives a stable sha256 hex key from a set of anchored paths.
 * Each entry is length-prefixed. Order and duplicates do not matter.
 */
export function anchoredPathsCacheKey(paths: Iterable<AnchoredPathRef>): string {
    const unique = new Set<string>();
    for (const entry of paths) {
        unique.add(entry.hashKey());
    }

    const hash = createHash("sha256");
    for (const value of [...unique].sort()) {
        hash.update(`${value.length}:${value}`, "utf8");
    }
    return hash.digest("hex");
}
