/**
 * Comparison keys for file paths.
 *
 * Keys are case-folded and use `/` as the only separator, so a path reported
 * by a Windows-hosted client and the same path seen on a case-insensitive mount
 * compare equal. `.` / `..` segments and symlinks are left untouched.
 */
export function normalizePath(path: string): string {
  if (!path) return '';
  let key = path.replace(/\\/g, '/').replace(/\/{2,}/g, '/');
  if (key.length > 1 && key.endsWith('/')) key = key.slice(0, -1);
  return key.toLowerCase();
}

/**
 * Key of a file inside a category: `<category>/<path relative to its content root>`.
 *
 * The client's save path and the local category folder usually differ (a
 * container mount, another host), so neither appears in the key.
 */
export function categoryKey(category: string, relativePath: string): string {
  return normalizePath(`${category}/${relativePath.replace(/^[\\/]+/, '')}`);
}
