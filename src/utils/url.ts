import { InvalidUrlError } from "./errors";

/**
 * Validates if a string is a valid URL
 * @throws {InvalidUrlError} If the URL is invalid
 */
export function validateUrl(url: string): void {
  try {
    new URL(url);
  } catch (error) {
    throw new InvalidUrlError(url, error instanceof Error ? error : undefined);
  }
}

/**
 * Normalizes a base URL so relative listing paths resolve beneath it.
 * Example: https://wheels.example.com -> https://wheels.example.com/
 */
export function ensureTrailingSlash(url: string): string {
  return `${url.replace(/\/+$/, "")}/`;
}

/**
 * Resolves `path` against `base`, the way a browser resolves an href.
 */
export function resolveUrl(path: string, base: string): string {
  return new URL(path, base).href;
}

/**
 * Checks if a target URL is under the same path as the base URL
 * Example: base = https://example.com/abc123/
 *          target = https://example.com/abc123/vllm/
 *          result = true
 */
export function isSubpath(baseUrl: URL, targetUrl: URL): boolean {
  if (baseUrl.origin !== targetUrl.origin) {
    return false;
  }
  const basePath = baseUrl.pathname.endsWith("/")
    ? baseUrl.pathname
    : `${baseUrl.pathname}/`;

  return targetUrl.pathname.startsWith(basePath);
}

/**
 * Extracts the file name an href points at.
 * Absolute links use the last segment of their path; relative links use the
 * last `/` segment with any fragment or query removed. Directory links
 * (trailing slash) yield an empty string.
 */
export function filenameFromHref(href: string): string {
  if (/^https?:\/\//i.test(href)) {
    try {
      const { pathname } = new URL(href);
      return pathname.slice(pathname.lastIndexOf("/") + 1);
    } catch {
      return "";
    }
  }
  const lastSegment = href.split("/").pop() ?? "";
  return lastSegment.split("#")[0].split("?")[0];
}
