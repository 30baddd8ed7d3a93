const SNOWFLAKE = /^\d{8,}$/;

/** Splits a comma/space separated list and keeps only snowflake-shaped IDs. */
export function parseAllowUserIds(raw: string | undefined): Set<string> {
  const ids = new Set<string>();
  for (const part of (raw ?? '').split(/[,\s]+/g)) {
    const id = part.trim();
    if (SNOWFLAKE.test(id)) ids.add(id);
  }
  return ids;
}

// Fail closed: an empty allowlist lets nobody through.
export function isAllowlisted(allowUserIds: ReadonlySet<string>, userId: string): boolean {
  if (allowUserIds.size === 0) return false;
  return allowUserIds.has(userId);
}
