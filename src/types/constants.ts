export const DEFAULT_OUTPUT_FILE = "termux_man_pages.pdf";
export const DEFAULT_DEBUG_FILE = "man_pages_debug.txt";
export const DEFAULT_TITLE = "Man Pages for Termux Packages";

export const DEFAULT_BATCH_SIZE = 50;
export const MAX_BATCH_SIZE = 500;
export const DEFAULT_QUEUE_TIMEOUT_MS = 1000;

export const DEFAULT_LIST_COMMAND = "pkg list-all";
export const DEFAULT_MANIFEST_COMMAND = "dpkg -L";
export const DEFAULT_RENDERER_COMMAND = "man";
export const DEFAULT_FILTER_COMMAND = "col -b";

/** Path segment that marks a file as a manual page. */
export const MAN_DIR_MARKER = "/man/";

export const COMPRESSED_SUFFIXES = [".gz", ".bz2", ".xz", ".lzma", ".Z", ".zst"];
