import KSUID from "ksuid";

function normalizeTag(tag: string): string {
  return tag
    .trim()
    .toLowerCase()
    .replace(/[^a-z0-9_]/g, "_")
    .replace(/^_+|_+$/g, "");
}

/**
 * Sortable KSUID ids, optionally prefixed with the owning table's tag.
 *
 * - `generateId()` -> `2Lr3...`
 * - `generateId("assignment")` -> `assignment_2Lr3...`
 */
export function generateId(tag = ""): string {
  const ksuid = KSUID.randomSync().string;
  const safeTag = normalizeTag(tag);
  return safeTag ? `${safeTag}_${ksuid}` : ksuid;
}
