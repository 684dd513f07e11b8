/**
 * Turns raw rendered man page text into header and paragraph blocks.
 *
 * Section headers are recognised by shape only: a line at column 0 made of
 * uppercase letters and spaces (`NAME`, `SEE ALSO`). An all-caps body line at
 * column 0 is classified as a header too.
 */

export type FormattedBlock =
  | { kind: "header"; text: string }
  | { kind: "paragraph"; text: string };

const ANSI_SEQUENCE = /\x1b\[[0-9;]*m/g;
const DOUBLED_CHARACTER = /(.)\1/g;
const HORIZONTAL_WHITESPACE = /[ \t]+/g;
const SECTION_HEADER = /^[A-Z][A-Z ]+$/;

export function isSectionHeader(line: string): boolean {
  return SECTION_HEADER.test(line);
}

/**
 * Steps 1-3: strip escapes and form feeds, undo overstrike doubling,
 * squeeze horizontal whitespace, normalise line endings.
 */
export function normalizeText(raw: string): string {
  return raw
    .replace(ANSI_SEQUENCE, "")
    .replace(/\f/g, "")
    .replace(DOUBLED_CHARACTER, "$1")
    .replace(HORIZONTAL_WHITESPACE, " ")
    .replace(/\r\n?/g, "\n");
}

export function formatText(raw: string): FormattedBlock[] {
  const blocks: FormattedBlock[] = [];
  let paragraph: string[] = [];

  const flush = () => {
    if (paragraph.length > 0) {
      blocks.push({ kind: "paragraph", text: paragraph.join("\n") });
      paragraph = [];
    }
  };

  for (const rawLine of normalizeText(raw).split("\n")) {
    const line = rawLine.trimEnd();

    if (!line.trim()) {
      flush();
      continue;
    }

    if (isSectionHeader(line)) {
      flush();
      blocks.push({ kind: "header", text: line });
      continue;
    }

    // Indented all-caps lines stay body text, on every pass.
    paragraph.push(line);
  }

  flush();
  return blocks;
}

/**
 * Join blocks back into text, one blank line between blocks.
 */
export function renderBlocks(blocks: FormattedBlock[]): string {
  return blocks.map((block) => block.text).join("\n\n");
}
