import type { RawProductBlock, SpecPair } from "./types";
import { classifySpec } from "./classifier";

export const CURRENCY_MARKER = "$";
export const PLACEHOLDER_CELL = "NaN";

const MARKER_PHRASE = /base configuration/i;
// Separator rows: "|---|---|", "| :-- | --: |"
const SEPARATOR_ROW = /^[|\-:\s]+$/;

export function splitCells(line: string): string[] {
  return line
    .split("|")
    .map((cell) => cell.trim())
    .filter((cell) => cell !== "");
}

export function isPriceCell(cell: string): boolean {
  return cell.startsWith(CURRENCY_MARKER);
}

/** "$1,299.00" → "1299.00" */
export function parsePriceCell(cell: string): string {
  return cell.split(CURRENCY_MARKER).join("").split(",").join("").trim();
}

export function isProductStart(line: string, cells: string[]): boolean {
  return cells[0] !== PLACEHOLDER_CELL && MARKER_PHRASE.test(line);
}

/**
 * Walk the table rows of a price list and cut them into product blocks.
 * A "Base Configuration" row opens a block; rows until the next one add
 * specs. The last "$" cell seen is the price of the block being closed.
 */
export function parsePriceList(markdown: string): RawProductBlock[] {
  const products: RawProductBlock[] = [];
  let current: { name: string; specifications: SpecPair[] } | null = null;
  let currentPrice: string | null = null;

  const finalize = () => {
    if (current && current.name && current.specifications.length > 0) {
      products.push({
        name: current.name,
        price: currentPrice,
        specifications: current.specifications,
      });
    }
  };

  const lines = markdown
    .split(/\r?\n/)
    .map((l) => l.trim())
    .filter((l) => l !== "");

  for (const line of lines) {
    if (!line.includes("|") || SEPARATOR_ROW.test(line)) continue;

    const cells = splitCells(line);
    if (cells.length === 0) continue;

    const priceCell = cells.find(isPriceCell);
    if (priceCell !== undefined) {
      currentPrice = parsePriceCell(priceCell);
    }

    if (isProductStart(line, cells)) {
      finalize();
      current = { name: cells[0], specifications: [] };
      console.log(`[parse] New product: ${current.name}`);
      continue;
    }

    if (!current || cells.length < 2) continue;

    // Price rows only move the running price
    if (isPriceCell(cells[1])) continue;

    if (cells[0] === PLACEHOLDER_CELL) {
      current.specifications.push({ label: classifySpec(cells[1]), value: cells[1] });
    } else {
      current.specifications.push({ label: cells[0], value: cells[1] });
    }
  }

  finalize();

  console.log(`[parse] Parsed ${products.length} products`);
  return products;
}

function serializeSpec(spec: SpecPair): string {
  // Classified rows go back under the placeholder so the label is derived again
  if (spec.label === classifySpec(spec.value)) {
    return `| ${PLACEHOLDER_CELL} | ${spec.value} |`;
  }
  const row = `| ${spec.label} | ${spec.value} |`;
  if (MARKER_PHRASE.test(row)) {
    throw new Error(`Labelled spec "${spec.label}" would read back as a product row: ${spec.value}`);
  }
  return row;
}

/**
 * Render blocks back into a table that parsePriceList reads as the same
 * products. Cell text must not contain "|". Throws for a labelled spec
 * containing the marker phrase, which no table can express.
 */
export function serializePriceList(blocks: RawProductBlock[]): string {
  const rows: string[] = ["| Configuration | Details |", "|---|---|"];

  for (const block of blocks) {
    rows.push(`| ${block.name} | Base Configuration |`);
    if (block.price) {
      rows.push(`| ${PLACEHOLDER_CELL} | ${CURRENCY_MARKER}${block.price} |`);
    }
    for (const spec of block.specifications) {
      rows.push(serializeSpec(spec));
    }
  }

  return rows.join("\n") + "\n";
}
