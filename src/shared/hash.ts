/**
 * FNV-1a hash for stable URL-to-filename mapping.
 * Used to name downloads whose URL has no usable file name.
 */
export function hashUrl(url: string): string {
  let hash = 2166136261;
  for (let i = 0; i < url.length; i++) {
    hash ^= url.charCodeAt(i);
    hash = Math.imul(hash, 16777619);
  }
  return (hash >>> 0).toString(16).padStart(8, '0');
}
