import type { FormattedBlock } from "./text-formatter.js";

/**
 * Everything the pipeline needs from a document renderer. Only the aggregator
 * calls into a sink, so implementations need not be safe for concurrent use.
 */
export interface DocumentSink {
  /** Start a new page for a package; the package name goes into the running header. */
  addPage(packageName: string): void;
  writeTitle(text: string): void;
  writeBody(blocks: FormattedBlock[]): void;
  /** Persist the document, overwriting `outputPath`. */
  finalize(outputPath: string): Promise<void>;
}
