import { vi } from "vitest";
import { HttpFetcher } from "../scraper/fetcher/HttpFetcher";
import { NetworkError } from "../utils/errors";

/**
 * Renders a minimal autoindex-style page linking to `hrefs`.
 */
export function listingPage(hrefs: string[]): string {
  const anchors = hrefs.map((href) => `<a href="${href}">${href}</a><br/>`).join("\n");
  return `<html><body><h1>Index</h1>\n${anchors}\n</body></html>`;
}

/**
 * Routes `HttpFetcher#fetch` to canned bodies keyed by absolute URL.
 * Strings are served as HTML, `Error`s are thrown, anything else is served as JSON.
 * Unknown URLs fail with a 404 `NetworkError`.
 */
export function serveRoutes(routes: Record<string, unknown>) {
  return vi.spyOn(HttpFetcher.prototype, "fetch").mockImplementation(async (source) => {
    if (!(source in routes)) {
      throw new NetworkError(`Failed to fetch ${source} after 1 attempts: 404`, 404);
    }
    const body = routes[source];
    if (body instanceof Error) {
      throw body;
    }
    return typeof body === "string"
      ? { content: body, mimeType: "text/html", source, status: 200 }
      : { content: JSON.stringify(body), mimeType: "application/json", source, status: 200 };
  });
}
