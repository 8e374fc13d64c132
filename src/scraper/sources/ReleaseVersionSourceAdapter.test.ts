import { afterEach, describe, expect, it, vi } from "vitest";
import { listingPage, serveRoutes } from "../../test-utils/fakeArtifactHost";
import { PyPiClient } from "../clients";
import { HttpFetcher } from "../fetcher";
import { ReleaseVersionSourceAdapter } from "./ReleaseVersionSourceAdapter";

vi.mock("../../utils/logger");

const BASE = "https://wheels.example.com/";
const PYPI = "https://pypi.example.com/pypi/";
const WHEEL = "vllm-0.9.2-cp38-abi3-manylinux1_x86_64.whl";

function createAdapter() {
  const fetcher = new HttpFetcher({ requestDelay: 0, maxRetries: 0 });
  return new ReleaseVersionSourceAdapter(fetcher, new PyPiClient(fetcher, PYPI), {
    baseUrl: BASE,
    packageName: "vllm",
  });
}

describe("ReleaseVersionSourceAdapter", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("should discover the newest versions first", async () => {
    serveRoutes({
      [`${PYPI}vllm/json`]: { releases: { "0.9.1": [], "0.10.0": [], "0.9.2": [] } },
    });

    expect(await createAdapter().discover(2)).toEqual(["0.10.0", "0.9.2"]);
  });

  it("should stop at the first path variant with artifacts", async () => {
    const fetchSpy = serveRoutes({
      [`${BASE}0.9.2/vllm/`]: listingPage([WHEEL]),
      [`${BASE}v0.9.2/`]: listingPage(["vllm-0.9.2-cp38-abi3-manylinux2014_aarch64.whl"]),
    });

    expect(await createAdapter().listArtifacts("0.9.2")).toEqual([
      { filename: WHEEL, url: `${BASE}0.9.2/vllm/${WHEEL}` },
    ]);
    expect(fetchSpy).toHaveBeenCalledTimes(2);
  });

  it("should fall back to the v-prefixed directory", async () => {
    serveRoutes({ [`${BASE}v0.9.2/vllm/`]: listingPage([WHEEL]) });

    expect(await createAdapter().listArtifacts("0.9.2")).toEqual([
      { filename: WHEEL, url: `${BASE}v0.9.2/vllm/${WHEEL}` },
    ]);
  });

  it("should return nothing when no variant exists", async () => {
    serveRoutes({});
    expect(await createAdapter().listArtifacts("0.1.0")).toEqual([]);
  });
});
