export * from "./types";
export { HttpFetcher, type HttpFetcherOptions } from "./HttpFetcher";
