import { SpecCategory } from "./types";

// ===== Spec Category Keywords =====
// Ordered: the first category with a substring hit wins, so a value that
// mentions both "ram" and "warranty" is Memory.

export type CategoryKeywords = readonly [SpecCategory, readonly string[]];

export const SPEC_CATEGORY_KEYWORDS: readonly CategoryKeywords[] = Object.freeze([
  [SpecCategory.PROCESSOR, ["processor", "intel", "amd", "core", "celeron", "xeon"]],
  [SpecCategory.MEMORY, ["memory", "gb:", "ram", "rdimm", "ddr"]],
  [SpecCategory.STORAGE, ["storage", "ssd", "hdd", "emmc", "hard drive", "nvme"]],
  // '"' catches screen sizes like 14"
  [SpecCategory.DISPLAY, ["display", "screen", "lcd", '"', "fhd", "hd", "monitor"]],
  [SpecCategory.GRAPHICS, ["graphics", "gpu", "radeon", "nvidia", "intel® uhd"]],
  [SpecCategory.POWER, ["adapter", "battery", "cell", "wh", "expresscharge"]],
  [SpecCategory.WIRELESS, ["wireless", "wi-fi", "bluetooth", "ax201", "ax211"]],
  [SpecCategory.OPERATING_SYSTEM, ["windows", "chrome"]],
  [SpecCategory.WARRANTY, ["warranty", "service", "support"]],
] as const);

// Labels the normalizer may use for main specs
export const KNOWN_SPEC_LABELS: readonly string[] = SPEC_CATEGORY_KEYWORDS.map(([category]) => category);
