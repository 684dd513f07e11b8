import { afterEach, describe, expect, it, vi } from "vitest";
import { ListingError, SinkFinalizeError } from "../errors.js";
import { logger } from "../utils/logger.js";
import {
  RecordingSink,
  StaticLister,
  TableFetcher,
  TableLocator,
} from "../test/fakes.js";
import { Coordinator, partition } from "./coordinator.js";
import type { CoordinatorOptions, PipelineDeps } from "./types.js";

const PAGES: Record<string, string[]> = {
  bash: ["/usr/share/man/man1/bash.1.gz", "/usr/share/man/man1/bashbug.1.gz"],
  curl: ["/usr/share/man/man1/curl.1.gz"],
};

const CONTENT: Record<string, string> = {
  "/usr/share/man/man1/bash.1.gz": "NAME\n bash - GNU Bourne-Again sh\n",
  "/usr/share/man/man1/bashbug.1.gz": "NAME\n bashbug - report a bug\n",
  "/usr/share/man/man1/curl.1.gz": "NAME\n curl - transfer a URL\n",
};

function createPipeline(
  packages: string[] | Error,
  overrides: Partial<PipelineDeps> = {},
): PipelineDeps & { sink: RecordingSink } {
  return {
    lister: new StaticLister(packages),
    locator: new TableLocator(PAGES),
    fetcher: new TableFetcher(CONTENT),
    ...overrides,
    sink: new RecordingSink(),
  };
}

function options(overrides: Partial<CoordinatorOptions> = {}): CoordinatorOptions {
  return { outputPath: "out.pdf", queueTimeoutMs: 20, ...overrides };
}

describe("partition", () => {
  it("splits into consecutive batches with a short tail", () => {
    expect(partition([1, 2, 3, 4, 5, 6, 7], 3)).toEqual([[1, 2, 3], [4, 5, 6], [7]]);
    expect(partition([], 3)).toEqual([]);
  });

  it("rejects a non-positive batch size", () => {
    expect(() => partition([1], 0)).toThrow(RangeError);
    expect(() => partition([1], 1.5)).toThrow(RangeError);
  });
});

describe("Coordinator.run", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("writes packages with pages and counts packages without them", async () => {
    const deps = createPipeline(["bash", "doesnotexist123", "curl"]);
    const coordinator = new Coordinator(deps, options());

    const result = await coordinator.run();

    expect(result.status).toBe("done");
    if (result.status !== "done") return;
    expect(result.stats).toEqual({
      processed: 3,
      packagesWithDocs: 2,
      totalPages: 3,
      failures: [],
    });
    expect(result.totalPackages).toBe(3);
    expect(result.batches).toBe(1);
    expect(result.outputPath).toBe("out.pdf");
    expect([...deps.sink.pagesAdded()].sort()).toEqual(["bash", "curl"]);
    expect(
      deps.sink.titles().filter((title) => title.startsWith("Man page: ")).sort(),
    ).toEqual([
      "Man page: bash.1.gz",
      "Man page: bashbug.1.gz",
      "Man page: curl.1.gz",
    ]);
    expect(deps.sink.calls.at(-1)).toEqual({ op: "finalize", outputPath: "out.pdf" });
    expect(coordinator.getPhase()).toBe("done");
  });

  it("keeps each package's pages together behind its package title", async () => {
    const deps = createPipeline(["bash", "curl"]);

    await new Coordinator(deps, options()).run();

    const titles = deps.sink.titles();
    const bashIndex = titles.indexOf("Package: bash");
    expect(titles.slice(bashIndex, bashIndex + 3)).toEqual([
      "Package: bash",
      "Man page: bash.1.gz",
      "Man page: bashbug.1.gz",
    ]);
  });

  it("never runs more fetches at once than the batch size", async () => {
    const names = ["a", "b", "c", "d", "e", "f", "g"];
    const fetcher = new TableFetcher(
      Object.fromEntries(names.map((name) => [name, `${name} text`])),
      10,
    );
    const deps = createPipeline(names, { fetcher });

    const result = await new Coordinator(deps, options({ batchSize: 3 })).run();

    expect(result.status).toBe("done");
    if (result.status !== "done") return;
    expect(result.batches).toBe(3);
    expect(result.stats.processed).toBe(7);
    expect(result.stats.packagesWithDocs).toBe(7);
    expect(fetcher.maxInFlight).toBe(3);
  });

  it("records a package whose locator throws and writes the others", async () => {
    const locator = new TableLocator(PAGES, { bash: new Error("manifest unreadable") });
    const deps = createPipeline(["bash", "curl"], { locator });

    const result = await new Coordinator(deps, options()).run();

    expect(result.status).toBe("done");
    if (result.status !== "done") return;
    expect(result.stats).toEqual({
      processed: 2,
      packagesWithDocs: 1,
      totalPages: 1,
      failures: [{ packageName: "bash", message: "manifest unreadable" }],
    });
    expect(deps.sink.pagesAdded()).toEqual(["curl"]);
  });

  it("aborts on an empty listing without finalizing", async () => {
    const deps = createPipeline([]);
    const coordinator = new Coordinator(deps, options());

    const result = await coordinator.run();

    expect(result).toMatchObject({ status: "aborted", reason: "empty-listing" });
    expect(deps.sink.calls).toEqual([]);
    expect(coordinator.getPhase()).toBe("aborted");
  });

  it("propagates a listing failure", async () => {
    const deps = createPipeline(new ListingError("pkg list-all", 2, "broken"));
    const coordinator = new Coordinator(deps, options());

    await expect(coordinator.run()).rejects.toBeInstanceOf(ListingError);
    expect(coordinator.getPhase()).toBe("aborted");
    expect(deps.sink.calls).toEqual([]);
  });

  it("only processes the first packages up to the limit", async () => {
    const deps = createPipeline(["bash", "curl", "doesnotexist123"]);

    const result = await new Coordinator(deps, options({ limit: 1 })).run();

    expect(result.status).toBe("done");
    if (result.status !== "done") return;
    expect(result.totalPackages).toBe(1);
    expect(result.stats.processed).toBe(1);
    expect(deps.sink.pagesAdded()).toEqual(["bash"]);
  });

  it("asks for confirmation with the package count and stops when declined", async () => {
    const deps = createPipeline(["bash", "curl"]);
    const confirm = vi.fn<(packageCount: number) => Promise<boolean>>();
    confirm.mockResolvedValue(false);

    const result = await new Coordinator(deps, options({ confirm })).run();

    expect(confirm).toHaveBeenCalledWith(2);
    expect(result).toMatchObject({ status: "aborted", reason: "declined" });
    expect(deps.sink.calls).toEqual([]);
  });

  it("wraps a finalize failure in SinkFinalizeError", async () => {
    const deps = createPipeline(["curl"]);
    deps.sink.finalizeError = new Error("disk full");
    const coordinator = new Coordinator(deps, options());

    const failure = coordinator.run();

    await expect(failure).rejects.toBeInstanceOf(SinkFinalizeError);
    await expect(failure).rejects.toThrow("Failed to write document out.pdf: disk full");
    expect(coordinator.getPhase()).toBe("aborted");
  });

  it("reports fetch and write progress up to the package total", async () => {
    const deps = createPipeline(["bash", "doesnotexist123", "curl"]);
    const progress = { onFetched: vi.fn(), onWritten: vi.fn() };

    await new Coordinator(deps, options({ progress })).run();

    expect(progress.onFetched).toHaveBeenCalledTimes(3);
    expect(progress.onFetched).toHaveBeenLastCalledWith(3, 3);
    expect(progress.onWritten).toHaveBeenCalledTimes(3);
    expect(progress.onWritten).toHaveBeenLastCalledWith(3, 3);
  });

  it("logs each batch's worker outcome", async () => {
    const debug = vi.spyOn(logger, "debug");
    const deps = createPipeline(["a", "b", "c"]);

    await new Coordinator(deps, options({ batchSize: 2 })).run();

    expect(debug).toHaveBeenCalledWith(
      expect.stringContaining("Batch 1: 2/2 workers completed, 0 failed"),
    );
    expect(debug).toHaveBeenCalledWith(
      expect.stringContaining("Batch 2: 1/1 workers completed, 0 failed"),
    );
  });
});
