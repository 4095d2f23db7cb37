import type { LayoutRow, OverflowPolicy, RenderResult, SpecEntry, StructuredRecord, UpgradeOption } from "../types";
import { cleanTextForPdf } from "../sanitize";
import type { SpecCanvas } from "./canvas";
import { COLORS, FONT_SIZES, SPACING, TABLE, contentWidth } from "./layout";

// Prices that mean "no price" once stringified
const EMPTY_PRICES = new Set(["", "None"]);

export interface RenderOptions {
  /** Where the title starts; defaults to the canvas's current position. */
  startY?: number;
  overflow?: OverflowPolicy;
  /** Lowest y a row may reach; defaults to the canvas page-break line. */
  bottomLimit?: number;
}

interface TableGeometry {
  contentWidth: number;
  labelWidth: number;
  valueWidth: number;
}

/**
 * Lines a value needs: the larger of its explicit line count and a wrap
 * estimate from its rendered width. The estimate can come up short of what
 * the wrapped text really takes.
 */
export function computeRowLines(value: string, textWidth: number, columnWidth: number): number {
  const explicitLines = value.split("\n").length;
  const wrappedLines = Math.max(1, Math.floor(textWidth / columnWidth) + 1);
  return Math.max(explicitLines, wrappedLines);
}

export function computeRowHeight(lines: number): number {
  return TABLE.baseRowHeight * Math.max(1, lines);
}

export function hasPrice(price: string | null | undefined): price is string {
  return price !== null && price !== undefined && !EMPTY_PRICES.has(price);
}

export function formatUpgradeText(option: UpgradeOption): string {
  return option.price ? `${option.value} - $${option.price}` : option.value;
}

function tableGeometry(canvas: SpecCanvas): TableGeometry {
  const width = contentWidth(canvas.pageWidth);
  return {
    contentWidth: width,
    labelWidth: width * TABLE.labelFraction,
    valueWidth: width * TABLE.valueFraction,
  };
}

class RowCursor {
  private dark = true;
  private clipping = false;
  rowsDrawn = 0;
  readonly clippedRows: string[] = [];

  constructor(
    private readonly canvas: SpecCanvas,
    private readonly overflow: OverflowPolicy,
    private readonly bottomLimit: number
  ) {}

  /** Returns false when the row must not be drawn. */
  reserve(label: string, height: number): boolean {
    if (this.clipping) {
      this.clippedRows.push(label);
      return false;
    }
    if (this.canvas.getY() + height <= this.bottomLimit) return true;

    if (this.overflow === "clip") {
      // Everything after the first row that doesn't fit is dropped too
      this.clipping = true;
      this.clippedRows.push(label);
      return false;
    }
    this.canvas.addPage();
    return true;
  }

  next(labelText: string, valueText: string, height: number): LayoutRow {
    const row = { labelText, valueText, height, fillIsDark: this.dark };
    this.dark = !this.dark;
    return row;
  }

  restartShading(): void {
    this.dark = true;
  }
}

function drawRowBackground(canvas: SpecCanvas, geometry: TableGeometry, row: LayoutRow): number {
  const top = canvas.getY();
  canvas.setFillGray(row.fillIsDark ? COLORS.darkRow : COLORS.lightRow);
  canvas.rect(canvas.getX(), top, geometry.contentWidth, row.height);

  canvas.setTextGray(COLORS.labelText);
  canvas.setFont("bold", FONT_SIZES.body);
  canvas.cell(geometry.labelWidth, row.height, row.labelText);
  return top;
}

function drawSpecRow(canvas: SpecCanvas, geometry: TableGeometry, cursor: RowCursor, spec: SpecEntry): void {
  const value = cleanTextForPdf(spec.value);
  if (!value) return;
  const label = cleanTextForPdf(spec.label);

  canvas.setFont("regular", FONT_SIZES.body);
  const lines = computeRowLines(spec.value, canvas.getStringWidth(value), geometry.valueWidth);
  const height = computeRowHeight(lines);

  if (!cursor.reserve(label, height)) return;
  const row = cursor.next(label, value, height);

  const top = drawRowBackground(canvas, geometry, row);
  canvas.setTextGray(COLORS.bodyText);
  canvas.setFont("regular", FONT_SIZES.body);
  canvas.multiCell(geometry.valueWidth, TABLE.baseRowHeight, row.valueText);

  canvas.setY(top + row.height);
  cursor.rowsDrawn++;
}

function drawUpgradeRow(canvas: SpecCanvas, geometry: TableGeometry, cursor: RowCursor, option: UpgradeOption): void {
  if (!cleanTextForPdf(option.value)) return;
  const text = formatUpgradeText(option);
  const lines = text.split("\n").length;
  const height = computeRowHeight(lines);
  const label = cleanTextForPdf(option.label);

  if (!cursor.reserve(label, height)) return;
  const row = cursor.next(label, cleanTextForPdf(text), height);

  const top = drawRowBackground(canvas, geometry, row);
  canvas.setTextGray(COLORS.bodyText);
  canvas.setFont("regular", FONT_SIZES.body);
  canvas.multiCell(geometry.valueWidth, row.height / lines, row.valueText);

  canvas.setY(top + row.height);
  cursor.rowsDrawn++;
}

function drawHeader(canvas: SpecCanvas, record: StructuredRecord): void {
  canvas.setTextGray(COLORS.bodyText);
  canvas.setFont("bold", FONT_SIZES.title);
  canvas.cell(0, SPACING.titleHeight, cleanTextForPdf(record.title), { newLine: true });

  if (hasPrice(record.price)) {
    canvas.setFont("bold", FONT_SIZES.price);
    canvas.cell(0, SPACING.priceHeight, `$${cleanTextForPdf(record.price)}`, { newLine: true });
  }
  canvas.ln(SPACING.afterPrice);
}

/**
 * Draw one product's spec sheet: title, price, then label/value rows in
 * alternating shades, then upgrade options if there are any.
 */
export function renderSpecSheet(
  canvas: SpecCanvas,
  record: StructuredRecord,
  options: RenderOptions = {}
): RenderResult {
  const geometry = tableGeometry(canvas);
  const cursor = new RowCursor(
    canvas,
    options.overflow ?? "paginate",
    options.bottomLimit ?? canvas.pageBreakY
  );

  if (options.startY !== undefined) canvas.setY(options.startY);

  drawHeader(canvas, record);

  for (const spec of record.mainSpecs) {
    drawSpecRow(canvas, geometry, cursor, spec);
  }

  const headingBlock =
    SPACING.beforeUpgrades + SPACING.sectionHeadingHeight + SPACING.afterSectionHeading + TABLE.baseRowHeight;

  if (record.upgradeOptions.length > 0 && cursor.reserve("UPGRADE OPTIONS", headingBlock)) {
    canvas.ln(SPACING.beforeUpgrades);
    canvas.setTextGray(COLORS.bodyText);
    canvas.setFont("bold", FONT_SIZES.sectionHeading);
    canvas.cell(0, SPACING.sectionHeadingHeight, "UPGRADE OPTIONS", { newLine: true });
    canvas.ln(SPACING.afterSectionHeading);

    cursor.restartShading();
    for (const option of record.upgradeOptions) {
      drawUpgradeRow(canvas, geometry, cursor, option);
    }
  } else if (record.upgradeOptions.length > 0) {
    cursor.clippedRows.push(...record.upgradeOptions.map((o) => cleanTextForPdf(o.label)));
  }

  if (cursor.clippedRows.length > 0) {
    console.warn(
      `[render] ${record.title}: ${cursor.clippedRows.length} rows did not fit and were left out (${cursor.clippedRows.join(", ")})`
    );
  }

  return {
    rowsDrawn: cursor.rowsDrawn,
    clippedRows: cursor.clippedRows,
    pageCount: canvas.pageCount,
  };
}
