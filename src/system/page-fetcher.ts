import { logger } from "../utils/logger.js";
import { getErrorMessage } from "../errors.js";
import { runCommand, withArgs, type CommandRunner, type CommandSpec } from "./exec.js";
import type { DocPageRef } from "./page-locator.js";

export interface PageFetcher {
  /** Rendered text, or `null` when the page is missing or rendering failed. */
  fetch(ref: DocPageRef): Promise<string | null>;
}

export interface RendererOptions {
  renderer: CommandSpec;
  /** Fed the renderer's output on stdin, e.g. `col -b`. */
  filter?: CommandSpec;
}

// C locale keeps groff from emitting Unicode hyphens and quotes.
const RENDER_ENV: NodeJS.ProcessEnv = {
  ...process.env,
  LC_ALL: "C",
  MANPAGER: "cat",
  PAGER: "cat",
};

/**
 * Renders a page with `man`, optionally piping through a filter that strips
 * overstrike and terminal control sequences.
 */
export class RendererPageFetcher implements PageFetcher {
  private options: RendererOptions;
  private run: CommandRunner;

  constructor(options: RendererOptions, run: CommandRunner = runCommand) {
    this.options = options;
    this.run = run;
  }

  async fetch(ref: DocPageRef): Promise<string | null> {
    try {
      const rendered = await this.run(withArgs(this.options.renderer, ref.target), {
        env: RENDER_ENV,
      });
      if (rendered.code !== 0 || !rendered.stdout.trim()) {
        return null;
      }

      if (!this.options.filter) {
        return rendered.stdout;
      }

      const filtered = await this.run(this.options.filter, {
        input: rendered.stdout,
      });
      if (filtered.code !== 0 || !filtered.stdout.trim()) {
        return null;
      }
      return filtered.stdout;
    } catch (error) {
      logger.debug(`Error fetching man page for ${ref.target}: ${getErrorMessage(error)}`);
      return null;
    }
  }
}
