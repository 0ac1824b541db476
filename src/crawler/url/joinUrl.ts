const ABSOLUTE_URL_PATTERN = /^https?:\/\//i;

/**
 * Appends a site-relative path to the base URL. Absolute http(s) paths are
 * returned unchanged.
 */
export function joinUrl(baseUrl: string, path: string): string {
  if (ABSOLUTE_URL_PATTERN.test(path)) {
    return path;
  }

  const base = baseUrl.replace(/\/+$/, '');
  const suffix = path.startsWith('/') ? path : `/${path}`;
  return `${base}${suffix}`;
}
