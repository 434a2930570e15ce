function normalizeSlashEnd(u: string): string {
  return u.replace(/\/+$/, "");
}

function normalizeSlashStart(u: string): string {
  return u.replace(/^\/+/, "");
}

function joinUrl(base: string, path: string): string {
  return `${normalizeSlashEnd(base)}/${normalizeSlashStart(path)}`;
}

function first<T>(val: T | T[] | undefined): T | undefined {
  return Array.isArray(val) ? val[0] : val;
}

function asArray<T>(val: T | T[] | undefined): T[] {
  if (val === undefined) return [];
  return Array.isArray(val) ? val : [val];
}

function getHeader(
  headers: Record<string, string>,
  name: string
): string | undefined {
  const wanted = name.toLowerCase();
  for (const [key, value] of Object.entries(headers)) {
    if (key.toLowerCase() === wanted) return value;
  }
  return undefined;
}

export {
  normalizeSlashEnd,
  normalizeSlashStart,
  joinUrl,
  first,
  asArray,
  getHeader,
};
