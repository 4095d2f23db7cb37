// ===== Enums =====

export enum SpecCategory {
  PROCESSOR = "Processor",
  MEMORY = "Memory",
  STORAGE = "Storage",
  DISPLAY = "Display",
  GRAPHICS = "Graphics",
  POWER = "Power",
  WIRELESS = "Wireless",
  OPERATING_SYSTEM = "Operating System",
  WARRANTY = "Warranty",
  OTHER = "Other",
}

// ===== Raw Product Block (parser output, messy) =====

export interface SpecPair {
  label: string; // category from the classifier, or an explicit label cell
  value: string;
}

export interface RawProductBlock {
  name: string;
  price: string | null; // digits only, e.g. "1299.00"
  specifications: SpecPair[];
}

// ===== Structured Record (normalized, layout-ready) =====

export interface SpecEntry {
  label: string;
  value: string;
}

export interface UpgradeOption {
  label: string;
  value: string;
  price: string | null;
}

export interface StructuredRecord {
  title: string;
  price: string | null;
  mainSpecs: SpecEntry[];
  upgradeOptions: UpgradeOption[];
}

export type NormalizeOutcome =
  | { ok: true; record: StructuredRecord; model: string }
  | { ok: false; error: string };

export type Normalizer = (block: RawProductBlock) => Promise<NormalizeOutcome>;

// ===== Layout =====

export interface LayoutRow {
  labelText: string;
  valueText: string;
  height: number;
  fillIsDark: boolean;
}

export type OverflowPolicy = "paginate" | "clip";

export interface RenderResult {
  rowsDrawn: number;
  clippedRows: string[]; // labels of rows not drawn under the clip policy
  pageCount: number;
}

// ===== Pipeline =====

export interface GeneratedSheet {
  productName: string;
  outputPath: string;
  normalized: boolean; // false when the fallback structure was used
  clippedRows: string[];
}

export interface FailedProduct {
  productName: string;
  outputPath: string;
  error: string;
}

export interface RunSummary {
  inputPath: string;
  outputDir: string;
  productCount: number;
  generated: GeneratedSheet[];
  failed: FailedProduct[];
  durationMs: number;
}
