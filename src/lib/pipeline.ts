import { access, mkdir, readFile, writeFile } from "fs/promises";
import path from "path";
import type {
  FailedProduct,
  GeneratedSheet,
  Normalizer,
  RawProductBlock,
  RenderResult,
  RunSummary,
} from "./types";
import { config } from "./config";
import { InputReadError, TemplateNotFoundError, errorMessage } from "./errors";
import { parsePriceList } from "./price-list-parser";
import { normalizeWithFallback } from "./llm/normalize";
import { PdfCanvas } from "./pdf/canvas";
import { TEMPLATE_BANDS } from "./pdf/layout";
import { renderSpecSheet } from "./pdf/spec-table";
import { overlayStaged } from "./pdf/template";
import { safeFileName, specSheetFileName } from "./output";
import { profiler as defaultProfiler } from "./profiler";
import type { PipelineProfiler } from "./profiler";

export interface GenerateOptions {
  inputPath: string;
  outputDir: string;
  normalizer: Normalizer;
  /** Overlay each sheet onto page 1 of this PDF. */
  templatePath?: string;
  concurrency?: number;
  profiler?: PipelineProfiler;
}

interface BuiltSheet {
  bytes: Uint8Array;
  normalized: boolean;
  render: RenderResult;
}

export async function readPriceList(inputPath: string): Promise<string> {
  let bytes: Buffer;
  try {
    bytes = await readFile(inputPath);
  } catch (err) {
    throw new InputReadError(inputPath, errorMessage(err));
  }

  try {
    return new TextDecoder("utf-8", { fatal: true }).decode(bytes);
  } catch {
    throw new InputReadError(inputPath, "file is not valid UTF-8");
  }
}

export async function loadTemplate(templatePath: string): Promise<Uint8Array> {
  try {
    await access(templatePath);
  } catch {
    throw new TemplateNotFoundError(templatePath);
  }
  return readFile(templatePath);
}

/** One output path per product; repeated names get "-2", "-3", ... */
export function assignOutputPaths(products: RawProductBlock[], outputDir: string): string[] {
  const seen = new Map<string, number>();
  return products.map((product) => {
    const base = safeFileName(product.name);
    const count = (seen.get(base) ?? 0) + 1;
    seen.set(base, count);
    const name = count === 1 ? base : `${base}-${count}`;
    return path.join(outputDir, specSheetFileName(name));
  });
}

export async function buildSpecSheet(
  block: RawProductBlock,
  normalizer: Normalizer,
  template: Uint8Array | null
): Promise<BuiltSheet> {
  const { record, outcome } = await normalizeWithFallback(normalizer, block);

  const canvas = await PdfCanvas.create({ title: record.title, autoPageBreak: template === null });
  const render = template
    ? renderSpecSheet(canvas, record, {
        startY: TEMPLATE_BANDS.contentStart,
        overflow: "clip",
        bottomLimit: TEMPLATE_BANDS.contentEnd,
      })
    : renderSpecSheet(canvas, record);

  const content = await canvas.save();
  const bytes = template ? await overlayStaged(content, template) : content;

  return { bytes, normalized: outcome.ok, render };
}

/**
 * Price list in, one PDF per product out. A product that fails to render
 * or write is logged and reported in the summary; the rest still run.
 */
export async function generateSpecSheets(options: GenerateOptions): Promise<RunSummary> {
  const startTime = Date.now();
  const profiler = options.profiler ?? defaultProfiler;
  const concurrency = Math.max(1, options.concurrency ?? config.maxConcurrentProducts);

  // Fail before any work if the background page is missing
  const template = options.templatePath ? await loadTemplate(options.templatePath) : null;

  console.log(`[pipeline] Reading price list: ${options.inputPath}`);
  const markdown = await profiler.time("pipeline:read", () => readPriceList(options.inputPath));
  const products = profiler.timeSync("pipeline:parse", () => parsePriceList(markdown));

  const generated: GeneratedSheet[] = [];
  const failed: FailedProduct[] = [];

  if (products.length === 0) {
    console.error(`[pipeline] No products found in ${options.inputPath}`);
    return {
      inputPath: options.inputPath,
      outputDir: options.outputDir,
      productCount: 0,
      generated,
      failed,
      durationMs: Date.now() - startTime,
    };
  }

  await mkdir(options.outputDir, { recursive: true });
  const outputPaths = assignOutputPaths(products, options.outputDir);

  console.log(
    `[pipeline] ${products.length} products → ${options.outputDir}${template ? " (template overlay)" : ""}`
  );

  profiler.start("pipeline:generate");
  for (let i = 0; i < products.length; i += concurrency) {
    const batch = products.slice(i, i + concurrency).map(async (product, offset) => {
      const index = i + offset;
      const outputPath = outputPaths[index];
      console.log(`[pipeline] Processing ${index + 1}/${products.length}: ${product.name}`);

      try {
        const sheet = await profiler.time(`product:${index + 1}:${product.name}`, () =>
          buildSpecSheet(product, options.normalizer, template)
        );
        await writeFile(outputPath, sheet.bytes);
        console.log(`[pipeline] Wrote ${outputPath}`);
        return {
          ok: true as const,
          sheet: {
            productName: product.name,
            outputPath,
            normalized: sheet.normalized,
            clippedRows: sheet.render.clippedRows,
          },
        };
      } catch (err) {
        console.error(`[pipeline] Failed to generate ${outputPath} for ${product.name}:`, err);
        return {
          ok: false as const,
          failure: { productName: product.name, outputPath, error: errorMessage(err) },
        };
      }
    });

    for (const result of await Promise.all(batch)) {
      if (result.ok) generated.push(result.sheet);
      else failed.push(result.failure);
    }
  }
  profiler.stop("pipeline:generate", { generated: generated.length, failed: failed.length });

  const durationMs = Date.now() - startTime;
  console.log(
    `[pipeline] Done: ${generated.length} generated, ${failed.length} failed in ${durationMs}ms`
  );

  return {
    inputPath: options.inputPath,
    outputDir: options.outputDir,
    productCount: products.length,
    generated,
    failed,
    durationMs,
  };
}
