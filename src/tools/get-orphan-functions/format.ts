export function formatOrphans(orphans: readonly string[]): string {
  if (orphans.length === 0) {
    return "No orphan functions found.";
  }
  return `Orphan functions (never called): ${orphans.join(", ")}`;
}
