import fs from "fs";
import path from "path";
import {
  PDFDocument,
  StandardFonts,
  rgb,
  type PDFFont,
  type PDFPage,
} from "pdf-lib";
import { SinkFinalizeError } from "../errors.js";
import type { DocumentSink } from "./document-sink.js";
import type { FormattedBlock } from "./text-formatter.js";

const A4_WIDTH = 595.28;
const A4_HEIGHT = 841.89;
const MARGIN = 48;
const HEADER_SIZE = 12;
const FOOTER_SIZE = 8;
const TITLE_SIZE = 12;
const SECTION_SIZE = 11;
const BODY_SIZE = 10;
const LINE_FACTOR = 1.35;

/** Top of the writable area, below the running header. */
const CONTENT_TOP = A4_HEIGHT - MARGIN - HEADER_SIZE * 2;
const CONTENT_BOTTOM = MARGIN + FOOTER_SIZE * 2;
const CONTENT_WIDTH = A4_WIDTH - MARGIN * 2;

type Fonts = {
  regular: PDFFont;
  bold: PDFFont;
  mono: PDFFont;
};

const TYPOGRAPHY: Array<[RegExp, string]> = [
  [/[\u2010\u2011\u2012\u2013\u2014\u2212]/g, "-"],
  [/[\u2018\u2019]/g, "'"],
  [/[\u201C\u201D]/g, '"'],
  [/\u2022/g, "*"],
];

/**
 * Standard fonts only encode WinAnsi. Common typography maps to its ASCII
 * form; anything else outside printable ASCII is replaced.
 */
export function toPdfSafeText(text: string): string {
  let safe = text.replace(/\t/g, " ");
  for (const [pattern, replacement] of TYPOGRAPHY) {
    safe = safe.replace(pattern, replacement);
  }
  return safe.replace(/[^\x20-\x7E\n]/g, "?");
}

export function wrapText(
  text: string,
  font: PDFFont,
  fontSize: number,
  maxWidth: number,
): string[] {
  const words = text.split(/\s+/).filter(Boolean);
  const lines: string[] = [];
  let currentLine = "";

  const fits = (candidate: string) =>
    font.widthOfTextAtSize(candidate, fontSize) <= maxWidth;

  for (let word of words) {
    // Break words that cannot fit on a line of their own.
    while (!fits(word) && word.length > 1) {
      let cut = word.length - 1;
      while (cut > 1 && !fits(word.slice(0, cut))) {
        cut--;
      }
      if (currentLine) {
        lines.push(currentLine);
        currentLine = "";
      }
      lines.push(word.slice(0, cut));
      word = word.slice(cut);
    }

    const potentialLine = currentLine ? `${currentLine} ${word}` : word;
    if (!fits(potentialLine) && currentLine) {
      lines.push(currentLine);
      currentLine = word;
    } else {
      currentLine = potentialLine;
    }
  }

  if (currentLine) {
    lines.push(currentLine);
  }

  return lines;
}

export interface PdfSinkOptions {
  /** Running header text; the current package is appended in parentheses. */
  title: string;
}

/**
 * DocumentSink drawing A4 pages with pdf-lib.
 */
export class PdfDocumentSink implements DocumentSink {
  private doc: PDFDocument;
  private fonts: Fonts;
  private title: string;
  private page: PDFPage | null;
  private y: number;
  private currentPackage: string | null;
  private pageHeaders: string[];

  private constructor(doc: PDFDocument, fonts: Fonts, options: PdfSinkOptions) {
    this.doc = doc;
    this.fonts = fonts;
    this.title = options.title;
    this.page = null;
    this.y = CONTENT_TOP;
    this.currentPackage = null;
    this.pageHeaders = [];
  }

  static async create(options: PdfSinkOptions): Promise<PdfDocumentSink> {
    const doc = await PDFDocument.create();
    doc.setTitle(options.title);
    doc.setCreator("manbook");
    const fonts: Fonts = {
      regular: await doc.embedFont(StandardFonts.Helvetica),
      bold: await doc.embedFont(StandardFonts.HelveticaBold),
      mono: await doc.embedFont(StandardFonts.Courier),
    };
    return new PdfDocumentSink(doc, fonts, options);
  }

  getPageCount(): number {
    return this.doc.getPageCount();
  }

  addPage(packageName: string): void {
    this.currentPackage = packageName;
    this.newPage();
  }

  writeTitle(text: string): void {
    this.writeLines(text, this.fonts.bold, TITLE_SIZE);
    this.y -= 5;
  }

  writeBody(blocks: FormattedBlock[]): void {
    for (const block of blocks) {
      if (block.kind === "header") {
        this.y -= 5;
        this.writeLines(block.text, this.fonts.bold, SECTION_SIZE);
        this.y -= 2;
      } else {
        for (const line of block.text.split("\n")) {
          this.writeLines(line, this.fonts.mono, BODY_SIZE);
        }
        this.y -= 2;
      }
    }
  }

  async finalize(outputPath: string): Promise<void> {
    try {
      this.drawRunningHeaders();
      const bytes = await this.doc.save();
      fs.writeFileSync(path.resolve(outputPath), bytes);
    } catch (error) {
      throw new SinkFinalizeError(outputPath, error);
    }
  }

  private newPage(): PDFPage {
    const page = this.doc.addPage([A4_WIDTH, A4_HEIGHT]);
    this.page = page;
    this.y = CONTENT_TOP;
    this.pageHeaders.push(
      this.currentPackage ? `${this.title} (${this.currentPackage})` : this.title,
    );
    return page;
  }

  private writeLines(text: string, font: PDFFont, size: number): void {
    const lineHeight = size * LINE_FACTOR;
    const lines = wrapText(toPdfSafeText(text), font, size, CONTENT_WIDTH);

    for (const line of lines) {
      let page = this.page ?? this.newPage();
      if (this.y - lineHeight < CONTENT_BOTTOM) {
        page = this.newPage();
      }
      this.y -= lineHeight;
      page.drawText(line, {
        x: MARGIN,
        y: this.y,
        size,
        font,
        color: rgb(0, 0, 0),
      });
    }
  }

  private drawRunningHeaders(): void {
    const pages = this.doc.getPages();
    pages.forEach((page, index) => {
      const header = toPdfSafeText(this.pageHeaders[index] ?? this.title);
      const headerWidth = this.fonts.bold.widthOfTextAtSize(header, HEADER_SIZE);
      page.drawText(header, {
        x: Math.max(MARGIN, (A4_WIDTH - headerWidth) / 2),
        y: A4_HEIGHT - MARGIN,
        size: HEADER_SIZE,
        font: this.fonts.bold,
      });

      const footer = `Page ${index + 1}`;
      const footerWidth = this.fonts.regular.widthOfTextAtSize(footer, FOOTER_SIZE);
      page.drawText(footer, {
        x: (A4_WIDTH - footerWidth) / 2,
        y: MARGIN - FOOTER_SIZE,
        size: FOOTER_SIZE,
        font: this.fonts.regular,
      });
    });
  }
}
