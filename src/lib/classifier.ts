import { SpecCategory } from "./types";
import { SPEC_CATEGORY_KEYWORDS, KNOWN_SPEC_LABELS } from "./classification-maps";

/**
 * Guess the category of a bare spec value (price lists usually leave the
 * label column as "NaN").
 */
export function classifySpec(value: string): SpecCategory {
  const lower = value.toLowerCase();

  for (const [category, keywords] of SPEC_CATEGORY_KEYWORDS) {
    if (keywords.some((keyword) => lower.includes(keyword))) return category;
  }

  return SpecCategory.OTHER;
}

/** The category a label names, ignoring case; null for anything else. */
export function canonicalSpecLabel(label: string): string | null {
  const lower = label.trim().toLowerCase();
  return KNOWN_SPEC_LABELS.find((known) => known.toLowerCase() === lower) ?? null;
}
