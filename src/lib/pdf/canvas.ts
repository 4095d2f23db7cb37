import { PDFDocument, StandardFonts, grayscale } from "pdf-lib";
import type { PDFFont, PDFPage } from "pdf-lib";
import { PAGE, pageBreakY } from "./layout";

export type FontStyle = "regular" | "bold";
export type CellAlign = "L" | "C" | "R";

export interface CellOptions {
  align?: CellAlign;
  newLine?: boolean; // move to the left margin of the next line afterwards
}

/**
 * Cursor-based drawing surface, in millimetres from the top-left corner.
 * The spec-sheet layout only talks to this interface.
 */
export interface SpecCanvas {
  readonly pageWidth: number;
  readonly pageHeight: number;
  readonly leftMargin: number;
  readonly rightMargin: number;
  readonly pageBreakY: number;
  readonly pageCount: number;

  getX(): number;
  getY(): number;
  /** Moves to the left margin at height y. */
  setY(y: number): void;
  setXY(x: number, y: number): void;
  addPage(): void;

  setFont(style: FontStyle, size: number): void;
  setFillGray(level: number): void;
  setTextGray(level: number): void;
  setDrawGray(level: number): void;
  getStringWidth(text: string): number;

  rect(x: number, y: number, width: number, height: number): void;
  line(x1: number, y1: number, x2: number, y2: number): void;
  /** A width of 0 extends the cell to the right margin. */
  cell(width: number, height: number, text: string, options?: CellOptions): void;
  multiCell(width: number, lineHeight: number, text: string, align?: CellAlign): void;
  ln(height?: number): void;
}

const PT_PER_MM = 72 / 25.4;
const CELL_MARGIN = 1;
const LINE_WIDTH_PT = 0.567;

function pt(mm: number): number {
  return mm * PT_PER_MM;
}

function gray(level: number) {
  return grayscale(Math.min(255, Math.max(0, level)) / 255);
}

/**
 * Greedy word wrap. Hard line breaks are kept; words wider than maxWidth
 * are split between characters.
 */
export function wrapText(text: string, maxWidth: number, measure: (s: string) => number): string[] {
  const lines: string[] = [];

  for (const paragraph of text.split("\n")) {
    let line = "";
    for (const word of paragraph.split(" ").filter((w) => w !== "")) {
      const candidate = line ? `${line} ${word}` : word;
      if (measure(candidate) <= maxWidth) {
        line = candidate;
        continue;
      }
      if (line) lines.push(line);

      let rest = word;
      while (rest.length > 1 && measure(rest) > maxWidth) {
        let cut = rest.length - 1;
        while (cut > 1 && measure(rest.slice(0, cut)) > maxWidth) cut--;
        lines.push(rest.slice(0, cut));
        rest = rest.slice(cut);
      }
      line = rest;
    }
    lines.push(line);
  }

  return lines;
}

export interface PdfCanvasOptions {
  autoPageBreak?: boolean;
  title?: string;
}

export class PdfCanvas implements SpecCanvas {
  readonly pageWidth = PAGE.width;
  readonly pageHeight = PAGE.height;
  readonly leftMargin = PAGE.marginLeft;
  readonly rightMargin = PAGE.marginRight;
  readonly pageBreakY = pageBreakY(PAGE.height);

  private page: PDFPage;
  private x: number = PAGE.marginLeft;
  private y: number = PAGE.marginTop;
  private fontStyle: FontStyle = "regular";
  private fontSize = 12;
  private fillGray = 0;
  private textGray = 0;
  private drawGray = 0;
  private lastCellHeight = 0;

  private constructor(
    private readonly doc: PDFDocument,
    private readonly fonts: Record<FontStyle, PDFFont>,
    private readonly autoPageBreak: boolean
  ) {
    this.page = this.newPage();
  }

  static async create(options: PdfCanvasOptions = {}): Promise<PdfCanvas> {
    const doc = await PDFDocument.create();
    if (options.title) doc.setTitle(options.title);
    doc.setCreator("spec-sheet-builder");

    const fonts = {
      regular: await doc.embedFont(StandardFonts.Helvetica),
      bold: await doc.embedFont(StandardFonts.HelveticaBold),
    };
    return new PdfCanvas(doc, fonts, options.autoPageBreak ?? true);
  }

  get pageCount(): number {
    return this.doc.getPageCount();
  }

  getX(): number {
    return this.x;
  }

  getY(): number {
    return this.y;
  }

  setY(y: number): void {
    this.x = this.leftMargin;
    this.y = y;
  }

  setXY(x: number, y: number): void {
    this.x = x;
    this.y = y;
  }

  addPage(): void {
    this.page = this.newPage();
  }

  setFont(style: FontStyle, size: number): void {
    this.fontStyle = style;
    this.fontSize = size;
  }

  setFillGray(level: number): void {
    this.fillGray = level;
  }

  setTextGray(level: number): void {
    this.textGray = level;
  }

  setDrawGray(level: number): void {
    this.drawGray = level;
  }

  getStringWidth(text: string): number {
    return this.fonts[this.fontStyle].widthOfTextAtSize(text, this.fontSize) / PT_PER_MM;
  }

  rect(x: number, y: number, width: number, height: number): void {
    this.page.drawRectangle({
      x: pt(x),
      y: pt(this.pageHeight - y - height),
      width: pt(width),
      height: pt(height),
      color: gray(this.fillGray),
    });
  }

  line(x1: number, y1: number, x2: number, y2: number): void {
    this.page.drawLine({
      start: { x: pt(x1), y: pt(this.pageHeight - y1) },
      end: { x: pt(x2), y: pt(this.pageHeight - y2) },
      thickness: LINE_WIDTH_PT,
      color: gray(this.drawGray),
    });
  }

  cell(width: number, height: number, text: string, options: CellOptions = {}): void {
    const w = width === 0 ? this.pageWidth - this.rightMargin - this.x : width;

    if (this.autoPageBreak && this.y + height > this.pageBreakY) {
      const x = this.x;
      this.addPage();
      this.x = x;
    }

    if (text) {
      const textWidth = this.getStringWidth(text);
      const dx =
        options.align === "C"
          ? (w - textWidth) / 2
          : options.align === "R"
            ? w - CELL_MARGIN - textWidth
            : CELL_MARGIN;
      // Baseline sits a little below the vertical middle of the box
      const baseline = this.y + height / 2 + (0.3 * this.fontSize) / PT_PER_MM;
      this.page.drawText(text, {
        x: pt(this.x + dx),
        y: pt(this.pageHeight - baseline),
        size: this.fontSize,
        font: this.fonts[this.fontStyle],
        color: gray(this.textGray),
      });
    }

    this.lastCellHeight = height;
    if (options.newLine) {
      this.x = this.leftMargin;
      this.y += height;
    } else {
      this.x += w;
    }
  }

  multiCell(width: number, lineHeight: number, text: string, align: CellAlign = "L"): void {
    const startX = this.x;
    const w = width === 0 ? this.pageWidth - this.rightMargin - startX : width;
    const lines = wrapText(text, w - 2 * CELL_MARGIN, (s) => this.getStringWidth(s));

    for (const line of lines) {
      this.x = startX;
      this.cell(w, lineHeight, line, { align });
      this.y += lineHeight;
    }
    this.x = this.leftMargin;
  }

  ln(height?: number): void {
    this.x = this.leftMargin;
    this.y += height ?? this.lastCellHeight;
  }

  async save(): Promise<Uint8Array> {
    return this.doc.save();
  }

  private newPage(): PDFPage {
    const page = this.doc.addPage([pt(this.pageWidth), pt(this.pageHeight)]);
    this.x = this.leftMargin;
    this.y = PAGE.marginTop;
    return page;
  }
}
