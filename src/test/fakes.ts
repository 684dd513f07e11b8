import type { DocumentSink } from "../document/document-sink.js";
import type { FormattedBlock } from "../document/text-formatter.js";
import type { PackageLister } from "../system/package-lister.js";
import type { PageFetcher } from "../system/page-fetcher.js";
import type { DocPageRef, PageLocator } from "../system/page-locator.js";

export type SinkCall =
  | { op: "addPage"; packageName: string }
  | { op: "title"; text: string }
  | { op: "body"; blocks: FormattedBlock[] }
  | { op: "finalize"; outputPath: string };

/**
 * DocumentSink that records every call instead of drawing.
 */
export class RecordingSink implements DocumentSink {
  calls: SinkCall[] = [];
  finalizeError: Error | null = null;

  addPage(packageName: string): void {
    this.calls.push({ op: "addPage", packageName });
  }

  writeTitle(text: string): void {
    this.calls.push({ op: "title", text });
  }

  writeBody(blocks: FormattedBlock[]): void {
    this.calls.push({ op: "body", blocks });
  }

  async finalize(outputPath: string): Promise<void> {
    if (this.finalizeError) {
      throw this.finalizeError;
    }
    this.calls.push({ op: "finalize", outputPath });
  }

  pagesAdded(): string[] {
    return this.calls.flatMap((call) => (call.op === "addPage" ? [call.packageName] : []));
  }

  titles(): string[] {
    return this.calls.flatMap((call) => (call.op === "title" ? [call.text] : []));
  }
}

export class StaticLister implements PackageLister {
  constructor(private packages: string[] | Error) {}

  async listPackages(): Promise<string[]> {
    if (this.packages instanceof Error) {
      throw this.packages;
    }
    return [...this.packages];
  }
}

/**
 * Locator backed by a package -> page paths table. Unknown packages have none.
 */
export class TableLocator implements PageLocator {
  calls: string[] = [];

  constructor(
    private table: Record<string, string[]>,
    private failures: Record<string, Error> = {},
  ) {}

  async locate(packageName: string): Promise<DocPageRef[]> {
    this.calls.push(packageName);
    const failure = this.failures[packageName];
    if (failure) {
      throw failure;
    }
    return (this.table[packageName] ?? []).map((target) => ({
      target,
      displayName: target.split("/").pop() ?? target,
    }));
  }
}

/**
 * Fetcher backed by a target -> text table, with an optional per-call delay.
 * Tracks the highest number of fetches in flight at once.
 */
export class TableFetcher implements PageFetcher {
  inFlight = 0;
  maxInFlight = 0;
  fetched: string[] = [];

  constructor(
    private pages: Record<string, string>,
    private delayMs = 0,
  ) {}

  async fetch(ref: DocPageRef): Promise<string | null> {
    this.inFlight++;
    this.maxInFlight = Math.max(this.maxInFlight, this.inFlight);
    try {
      if (this.delayMs > 0) {
        await new Promise((resolve) => setTimeout(resolve, this.delayMs));
      }
      this.fetched.push(ref.target);
      return this.pages[ref.target] ?? null;
    } finally {
      this.inFlight--;
    }
  }
}
