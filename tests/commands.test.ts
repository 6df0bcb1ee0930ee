import fs from "node:fs";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import type { Prompter } from "../src/cli/prompt";
import type { AppConfig } from "../src/config";
import { runDownload, runList, runRetry } from "../src/core/commands";
import type { CommandContext } from "../src/core/commands";
import { CancelledError, DestinationUnusableError, FetchError } from "../src/core/errors";
import type { FetchFn } from "../src/core/fetch";
import { Logger, MetricsRegistry } from "../src/observability";
import type { ConflictChoice } from "../src/selection";
import { bytes, file, html, makeTempDir, quietLogger, removeDir, routedFetch, status, testConfig } from "./helpers";
import type { RouteHandler } from "./helpers";

const ROOT = "https://portal.example/dataset/?groups=candidatos";
const PERIOD_2024 = "https://portal.example/dataset/candidatos-2024";
const PERIOD_2022 = "https://portal.example/dataset/candidatos-2022";
const URL_A = "https://cdn.example/files/A.zip";
const URL_B = "https://cdn.example/files/B.csv";
const URL_C = "https://cdn.example/files/C.zip";

const listing = html(`
  <a href="/dataset/candidatos-2022">Candidatos 2022</a>
  <a href="/dataset/candidatos-2024">Candidatos 2024</a>`);

function detailPage(items: Array<{ url: string; size?: number }>): RouteHandler {
  const rows = items
    .map(
      (item) => `
        <li class="resource-item"${item.size !== undefined ? ` data-size-bytes="${item.size}"` : ""}>
          <a class="heading" href="/r">${path.posix.basename(item.url)}</a>
          <a href="${item.url}">Explorar</a>
        </li>`,
    )
    .join("");
  return html(`<section><h2>Dados e recursos</h2><ul>${rows}</ul></section>`);
}

const payloadA = bytes(500, 0x41);
const payloadB = bytes(64, 0x42);
const payloadC = bytes(32, 0x43);

function catalog(extra: Record<string, RouteHandler> = {}, withC = false): Record<string, RouteHandler> {
  const items = [{ url: URL_A, size: 500 }, { url: URL_B }];
  return {
    [ROOT]: listing,
    [PERIOD_2024]: detailPage(withC ? [...items, { url: URL_C }] : items),
    [PERIOD_2022]: html("<h1>Candidatos 2022</h1>"),
    [URL_A]: file(payloadA),
    [URL_B]: file(payloadB),
    ...extra,
  };
}

function scriptedPrompter(answers: ConflictChoice[]): Prompter & { conflicts: number } {
  const prompter = {
    conflicts: 0,
    selectPeriods: async () => {
      throw new Error("selection is passed explicitly in these tests");
    },
    chooseConflict: async (): Promise<ConflictChoice> => {
      prompter.conflicts += 1;
      const answer = answers.shift();
      if (!answer) {
        throw new Error("no scripted answer left");
      }
      return answer;
    },
  };
  return prompter;
}

describe("commands", () => {
  let dir: string;

  beforeEach(() => {
    dir = makeTempDir();
  });

  afterEach(() => {
    removeDir(dir);
    vi.restoreAllMocks();
  });

  function context(fetchFn: FetchFn, overrides: Partial<AppConfig> = {}, prompter?: Prompter): CommandContext {
    return {
      runId: "harvest_test",
      config: testConfig({ catalogUrl: ROOT, outputDir: dir, ...overrides }),
      logger: quietLogger(),
      metrics: new MetricsRegistry(),
      fetchFn,
      prompter,
    };
  }

  const manifestPath = (): string => path.join(dir, "failed_downloads.txt");

  it("lists periods newest first", async () => {
    const log = vi.spyOn(console, "log").mockImplementation(() => undefined);
    const { fetchFn } = routedFetch(catalog());

    const periods = await runList(context(fetchFn));

    expect(periods.map((period) => period.label)).toEqual(["2024", "2022"]);
    expect(log.mock.calls.map((call) => call[0])).toEqual([
      `  1. 2024  ${PERIOD_2024}`,
      `  2. 2022  ${PERIOD_2022}`,
    ]);
  });

  it("downloads every resource of the selected periods into an empty destination", async () => {
    const { fetchFn } = routedFetch(catalog());

    const summary = await runDownload(context(fetchFn), { selection: "all" });

    expect(summary).toEqual({ downloaded: 2, skipped: 0, failed: 0 });
    expect(fs.statSync(path.join(dir, "2024", "A.zip")).size).toBe(500);
    expect(fs.readFileSync(path.join(dir, "2024", "B.csv"))).toEqual(Buffer.from(payloadB));
    expect(fs.existsSync(path.join(dir, "2022"))).toBe(true);
    expect(fs.existsSync(manifestPath())).toBe(false);
  });

  it("skips the rest of the run after skip-all at the first prompt", async () => {
    fs.mkdirSync(path.join(dir, "2024"), { recursive: true });
    fs.writeFileSync(path.join(dir, "2024", "A.zip"), payloadA);
    const { fetchFn, requests } = routedFetch(catalog());
    const prompter = scriptedPrompter(["sa"]);

    const summary = await runDownload(context(fetchFn, {}, prompter), { selection: "1" });

    expect(summary).toEqual({ downloaded: 0, skipped: 2, failed: 0 });
    expect(prompter.conflicts).toBe(1);
    expect(fs.existsSync(path.join(dir, "2024", "B.csv"))).toBe(false);
    expect(requests.some((request) => request.url.startsWith("https://cdn.example/"))).toBe(false);
  });

  it("records a resource that keeps failing in the manifest", async () => {
    const { fetchFn, requests } = routedFetch(catalog({ [URL_C]: status(500) }, true));

    const summary = await runDownload(context(fetchFn), { selection: "1" });

    expect(summary).toEqual({ downloaded: 2, skipped: 0, failed: 1 });
    expect(requests.filter((request) => request.url === URL_C)).toHaveLength(3);
    expect(fs.readFileSync(manifestPath(), "utf-8")).toBe(`2024, C.zip, ${URL_C}, transient\n`);
  });

  it("logs how many transfers were attempted in the run summary", async () => {
    fs.mkdirSync(path.join(dir, "2024"), { recursive: true });
    fs.writeFileSync(path.join(dir, "2024", "B.csv"), payloadB);
    const log = vi.spyOn(console, "log").mockImplementation(() => undefined);
    const { fetchFn } = routedFetch(catalog());
    const logger = new Logger({ component: "download", runId: "harvest_test", minLevel: "info" });

    await runDownload({ ...context(fetchFn, { onExisting: "skip" }), logger }, { selection: "1" });

    const lines = log.mock.calls.map((call) => JSON.parse(String(call[0])));
    const summary = lines.find((line) => line.msg === "run_summary");
    expect(summary).toMatchObject({ downloaded: 1, skipped: 1, failed: 0, attempted: 2, interrupted: false });
  });

  it("produces the same files when run twice with overwrite-all", async () => {
    const { fetchFn } = routedFetch(catalog());

    await runDownload(context(fetchFn, { onExisting: "overwrite" }), { selection: "all" });
    const first = fs.readFileSync(path.join(dir, "2024", "A.zip"));
    const second = await runDownload(context(fetchFn, { onExisting: "overwrite" }), { selection: "all" });

    expect(second).toEqual({ downloaded: 2, skipped: 0, failed: 0 });
    expect(fs.readFileSync(path.join(dir, "2024", "A.zip"))).toEqual(first);
  });

  it("leaves every file untouched on a second run with skip-all", async () => {
    const { fetchFn } = routedFetch(catalog());
    await runDownload(context(fetchFn), { selection: "all" });
    const before = fs.readFileSync(path.join(dir, "2024", "B.csv"));

    const second = await runDownload(context(fetchFn, { onExisting: "skip" }), { selection: "all" });

    expect(second).toEqual({ downloaded: 0, skipped: 2, failed: 0 });
    expect(fs.readFileSync(path.join(dir, "2024", "B.csv"))).toEqual(before);
  });

  it("rejects a selection that does not fit the catalog", async () => {
    const { fetchFn } = routedFetch(catalog());

    await expect(runDownload(context(fetchFn), { selection: "9" })).rejects.toThrow(
      "Invalid period selection: index 9 is outside 1-2",
    );
  });

  it("aborts when the catalog root is unreachable", async () => {
    const { fetchFn } = routedFetch({});

    await expect(runDownload(context(fetchFn), { selection: "all" })).rejects.toBeInstanceOf(FetchError);
    expect(fs.existsSync(manifestPath())).toBe(false);
  });

  it("stops before any request once the run is cancelled", async () => {
    const { fetchFn, requests } = routedFetch(catalog());
    const interrupt = new AbortController();
    interrupt.abort();

    await expect(
      runDownload({ ...context(fetchFn), signal: interrupt.signal }, { selection: "all" }),
    ).rejects.toBeInstanceOf(CancelledError);
    expect(requests).toHaveLength(0);
  });

  it("keeps going after a file error while the directory is still writable", async () => {
    fs.mkdirSync(path.join(dir, "2024", "A.zip.part"), { recursive: true });
    const { fetchFn, requests } = routedFetch(catalog());

    const summary = await runDownload(context(fetchFn), { selection: "1" });

    expect(summary).toEqual({ downloaded: 1, skipped: 0, failed: 1 });
    expect(requests.some((request) => request.url === URL_B)).toBe(true);
    expect(fs.readFileSync(manifestPath(), "utf-8")).toBe(`2024, A.zip, ${URL_A}, io\n`);
  });

  it("aborts the run once the period directory becomes unusable", async () => {
    const periodDir = path.join(dir, "2024");
    const serveA = file(payloadA);
    const { fetchFn, requests } = routedFetch(
      catalog({
        [URL_A]: (request) => {
          fs.rmSync(periodDir, { recursive: true, force: true });
          fs.writeFileSync(periodDir, "not a directory");
          return serveA(request);
        },
      }),
    );

    await expect(runDownload(context(fetchFn), { selection: "1" })).rejects.toBeInstanceOf(DestinationUnusableError);
    expect(requests.some((request) => request.url === URL_B)).toBe(false);
    expect(fs.readFileSync(manifestPath(), "utf-8")).toBe(`2024, A.zip, ${URL_A}, io\n`);
  });

  it("refuses to start when a period directory cannot be created", async () => {
    fs.writeFileSync(path.join(dir, "2024"), "not a directory");
    const { fetchFn, requests } = routedFetch(catalog());

    await expect(runDownload(context(fetchFn), { selection: "1" })).rejects.toBeInstanceOf(DestinationUnusableError);
    expect(requests.some((request) => request.url.startsWith("https://cdn.example/"))).toBe(false);
  });

  describe("with several transfers in flight", () => {
    function delayed(fetchFn: FetchFn): { fetchFn: FetchFn; peak: () => number } {
      let inFlight = 0;
      let peak = 0;
      const wrapped: FetchFn = async (url, init) => {
        if (!url.startsWith("https://cdn.example/")) {
          return fetchFn(url, init);
        }
        inFlight += 1;
        peak = Math.max(peak, inFlight);
        await new Promise((resolve) => setTimeout(resolve, 50));
        inFlight -= 1;
        return fetchFn(url, init);
      };
      return { fetchFn: wrapped, peak: () => peak };
    }

    it("runs up to the configured number of transfers at once", async () => {
      const routed = routedFetch(catalog({ [URL_C]: file(payloadC) }, true));
      const { fetchFn, peak } = delayed(routed.fetchFn);

      const summary = await runDownload(context(fetchFn, { transferConcurrency: 3 }), { selection: "1" });

      expect(summary).toEqual({ downloaded: 3, skipped: 0, failed: 0 });
      expect(peak()).toBe(3);
      expect(fs.readFileSync(path.join(dir, "2024", "C.zip"))).toEqual(Buffer.from(payloadC));
    });

    it("asks a single conflict question when skip-all is chosen", async () => {
      fs.mkdirSync(path.join(dir, "2024"), { recursive: true });
      fs.writeFileSync(path.join(dir, "2024", "A.zip"), payloadA);
      fs.writeFileSync(path.join(dir, "2024", "B.csv"), payloadB);
      fs.writeFileSync(path.join(dir, "2024", "C.zip"), payloadC);
      const routed = routedFetch(catalog({ [URL_C]: file(payloadC) }, true));
      const prompter = scriptedPrompter(["sa"]);

      const summary = await runDownload(context(routed.fetchFn, { transferConcurrency: 3 }, prompter), {
        selection: "1",
      });

      expect(summary).toEqual({ downloaded: 0, skipped: 3, failed: 0 });
      expect(prompter.conflicts).toBe(1);
      expect(routed.requests.some((request) => request.url.startsWith("https://cdn.example/"))).toBe(false);
    });
  });

  describe("retry", () => {
    it("does nothing without a manifest", async () => {
      const { fetchFn, requests } = routedFetch({});

      await expect(runRetry(context(fetchFn))).resolves.toEqual({ downloaded: 0, skipped: 0, failed: 0 });
      expect(requests).toHaveLength(0);
    });

    it("removes the manifest once every entry succeeds", async () => {
      await runDownload(context(routedFetch(catalog({ [URL_C]: status(500) }, true)).fetchFn), { selection: "1" });
      const { fetchFn, requests } = routedFetch({ [URL_C]: file(payloadC) });

      const summary = await runRetry(context(fetchFn));

      expect(summary).toEqual({ downloaded: 1, skipped: 0, failed: 0 });
      expect(requests.map((request) => request.url)).toEqual([URL_C]);
      expect(fs.readFileSync(path.join(dir, "2024", "C.zip"))).toEqual(Buffer.from(payloadC));
      expect(fs.existsSync(manifestPath())).toBe(false);
    });

    it("rewrites the manifest with what still fails", async () => {
      fs.writeFileSync(
        manifestPath(),
        [`2024, C.zip, ${URL_C}, transient`, `2022, D.csv, https://cdn.example/files/D.csv, io`, ""].join("\n"),
      );
      const { fetchFn } = routedFetch({ [URL_C]: file(payloadC) });

      const summary = await runRetry(context(fetchFn));

      expect(summary).toEqual({ downloaded: 1, skipped: 0, failed: 1 });
      expect(fs.readFileSync(manifestPath(), "utf-8")).toBe("2022, D.csv, https://cdn.example/files/D.csv, terminal\n");
    });
  });
});
