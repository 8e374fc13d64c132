import { afterEach, describe, expect, it, vi } from "vitest";
import { listingPage, serveRoutes } from "../../test-utils/fakeArtifactHost";
import { NetworkError } from "../../utils/errors";
import { HttpFetcher } from "../fetcher";
import { NIGHTLY_CANDIDATE, NightlySourceAdapter } from "./NightlySourceAdapter";

vi.mock("../../utils/logger");

const BASE = "https://wheels.example.com/";
const WHEEL = "vllm-1.0.0.dev12-cp38-abi3-manylinux1_x86_64.whl";

function createAdapter() {
  return new NightlySourceAdapter(new HttpFetcher({ requestDelay: 0 }), {
    baseUrl: BASE,
    packageName: "vllm",
  });
}

describe("NightlySourceAdapter", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("should always offer the single nightly candidate", async () => {
    expect(await createAdapter().discover()).toEqual([NIGHTLY_CANDIDATE]);
    expect(createAdapter().toSourceKey()).toEqual({ kind: "nightly" });
  });

  it("should read the package subdirectory when the nightly root holds no files", async () => {
    serveRoutes({
      [`${BASE}nightly/`]: listingPage(["vllm/"]),
      [`${BASE}nightly/vllm/`]: listingPage([WHEEL]),
    });

    expect(await createAdapter().listArtifacts()).toEqual([
      { filename: WHEEL, url: `${BASE}nightly/vllm/${WHEEL}` },
    ]);
  });

  it("should try the simple index layout last", async () => {
    serveRoutes({
      [`${BASE}nightly/`]: new NetworkError("Failed to fetch: 503", 503),
      [`${BASE}nightly/simple/vllm/`]: listingPage([WHEEL]),
    });

    expect(await createAdapter().listArtifacts()).toEqual([
      { filename: WHEEL, url: `${BASE}nightly/simple/vllm/${WHEEL}` },
    ]);
  });

  it("should fail when no nightly path can be read", async () => {
    const failure = new NetworkError("Failed to fetch: 503", 503);
    serveRoutes({
      [`${BASE}nightly/`]: failure,
      [`${BASE}nightly/vllm/`]: failure,
      [`${BASE}nightly/simple/vllm/`]: failure,
    });

    await expect(createAdapter().listArtifacts()).rejects.toBe(failure);
  });
});
