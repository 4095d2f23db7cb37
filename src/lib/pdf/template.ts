import { mkdtemp, readFile, rm, writeFile } from "fs/promises";
import { tmpdir } from "os";
import path from "path";
import { randomUUID } from "crypto";
import { PDFDocument } from "pdf-lib";
import { PdfCanvas } from "./canvas";
import { COLORS, FONT_SIZES, PAGE, TEMPLATE_BANDS } from "./layout";

/**
 * Background page with grey header and footer bands to be replaced with
 * real artwork in a PDF editor. The content area between the markers is
 * where spec sheets are drawn.
 */
export async function createTemplatePdf(): Promise<Uint8Array> {
  const canvas = await PdfCanvas.create({ autoPageBreak: false, title: "Spec sheet template" });

  canvas.setFillGray(COLORS.templateBand);
  canvas.rect(0, 0, PAGE.width, TEMPLATE_BANDS.headerBottom);

  canvas.setFont("bold", FONT_SIZES.templateCaption);
  canvas.setTextGray(COLORS.templateCaption);
  canvas.setXY(PAGE.marginLeft, 30);
  canvas.cell(0, 10, "HEADER AREA - Edit in PDF editor", { align: "C", newLine: true });

  canvas.setFont("regular", FONT_SIZES.templateMarker);
  canvas.setTextGray(COLORS.templateGuide);
  canvas.setXY(PAGE.marginLeft, TEMPLATE_BANDS.contentStart);
  canvas.cell(0, 10, "--- Content will start here ---", { newLine: true });
  canvas.setXY(PAGE.marginLeft, TEMPLATE_BANDS.contentEnd);
  canvas.cell(0, 10, "--- Content will end here ---", { newLine: true });

  canvas.setFillGray(COLORS.templateBand);
  canvas.rect(0, TEMPLATE_BANDS.footerTop, PAGE.width, PAGE.height - TEMPLATE_BANDS.footerTop);

  canvas.setFont("bold", FONT_SIZES.templateCaption);
  canvas.setTextGray(COLORS.templateCaption);
  canvas.setXY(PAGE.marginLeft, 272);
  canvas.cell(0, 10, "FOOTER AREA - Edit in PDF editor", { align: "C", newLine: true });

  canvas.setDrawGray(COLORS.templateGuide);
  const right = PAGE.width - PAGE.marginRight;
  canvas.line(PAGE.marginLeft, TEMPLATE_BANDS.headerBottom, right, TEMPLATE_BANDS.headerBottom);
  canvas.line(PAGE.marginLeft, TEMPLATE_BANDS.footerTop, right, TEMPLATE_BANDS.footerTop);

  return canvas.save();
}

/**
 * Flatten page 1 of the content PDF over page 1 of the template. Any other
 * pages of either document are ignored.
 */
export async function overlayOnTemplate(contentPdf: Uint8Array, templatePdf: Uint8Array): Promise<Uint8Array> {
  const [template, content] = await Promise.all([
    PDFDocument.load(templatePdf),
    PDFDocument.load(contentPdf),
  ]);
  if (template.getPageCount() === 0) throw new Error("Template PDF has no pages");
  if (content.getPageCount() === 0) throw new Error("Content PDF has no pages");

  const merged = await PDFDocument.create();
  const title = content.getTitle();
  if (title) merged.setTitle(title);

  const [background] = await merged.copyPages(template, [0]);
  const page = merged.addPage(background);
  const overlay = await merged.embedPage(content.getPage(0));
  page.drawPage(overlay, { x: 0, y: 0 });

  return merged.save();
}

/**
 * Write bytes to a file no other task shares, hand its path to fn, and
 * remove it afterwards whether fn succeeds or throws.
 */
export async function withStagingFile<T>(bytes: Uint8Array, fn: (filePath: string) => Promise<T>): Promise<T> {
  const dir = await mkdtemp(path.join(tmpdir(), "spec-sheet-"));
  try {
    const filePath = path.join(dir, `${randomUUID()}.pdf`);
    await writeFile(filePath, bytes);
    return await fn(filePath);
  } finally {
    await rm(dir, { recursive: true, force: true });
  }
}

/** Overlay via a staged copy of the content page. */
export async function overlayStaged(contentPdf: Uint8Array, templatePdf: Uint8Array): Promise<Uint8Array> {
  return withStagingFile(contentPdf, async (stagedPath) =>
    overlayOnTemplate(await readFile(stagedPath), templatePdf)
  );
}
