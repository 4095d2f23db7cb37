import Anthropic from "@anthropic-ai/sdk";
import type { NormalizeOutcome, Normalizer, RawProductBlock, SpecEntry, StructuredRecord, UpgradeOption } from "../types";
import { KNOWN_SPEC_LABELS } from "../classification-maps";
import { canonicalSpecLabel } from "../classifier";
import { NormalizerResponseError, errorMessage } from "../errors";

export interface AnthropicNormalizerOptions {
  apiKey: string;
  model: string;
  timeoutMs: number;
  maxTokens: number;
}

const REPORT_SPEC_SHEET_TOOL: Anthropic.Tool = {
  name: "report_spec_sheet",
  description:
    "Report the product's spec sheet. Only include main specs that appear in the raw data.",
  input_schema: {
    type: "object" as const,
    properties: {
      title: { type: "string", description: "Product title, usually the configuration name as given." },
      price: {
        type: ["string", "null"],
        description: "Base price as digits with an optional decimal part, no currency sign. null if unknown.",
      },
      main_specs: {
        type: "array",
        items: {
          type: "object",
          properties: {
            label: { type: "string", enum: [...KNOWN_SPEC_LABELS] },
            value: { type: "string", description: "Clear, readable spec value." },
          },
          required: ["label", "value"],
        },
      },
      upgrade_options: {
        type: "array",
        items: {
          type: "object",
          properties: {
            label: { type: "string" },
            value: { type: "string" },
            price: { type: ["string", "null"] },
          },
          required: ["label", "value"],
        },
      },
    },
    required: ["title", "main_specs", "upgrade_options"],
  },
};

export function buildNormalizePrompt(block: RawProductBlock): string {
  const specsText = block.specifications.map((spec) => `${spec.label}: ${spec.value}`).join("\n");

  return `Analyze and organize this product configuration into a spec sheet. Identify and categorize each specification correctly.

Product: ${block.name}
Price: $${block.price ?? "N/A"}

Raw Specifications:
${specsText}

Use one main spec per category (${KNOWN_SPEC_LABELS.join(", ")}), and only for categories present in the raw data. Format values to be clear and readable. Optional add-ons or upgrades with their own price go in upgrade_options. Report using the report_spec_sheet tool.`;
}

// ===== Response validation =====

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function nonEmptyString(value: unknown): string | null {
  return typeof value === "string" && value.trim() !== "" ? value.trim() : null;
}

/** Accepts "$1,299", 1299 or "1299.00"; returns digits or null. */
function priceString(value: unknown): string | null {
  if (typeof value === "number" && Number.isFinite(value)) return String(value);
  const text = nonEmptyString(value);
  if (!text || text === "None" || text === "N/A") return null;
  return text.replace(/[$,]/g, "").trim() || null;
}

function parseMainSpecs(value: unknown): SpecEntry[] {
  if (!Array.isArray(value)) throw new NormalizerResponseError("main_specs is not an array");

  const specs: SpecEntry[] = [];
  for (const item of value) {
    if (!isRecord(item)) continue;
    const label = typeof item.label === "string" ? canonicalSpecLabel(item.label) : null;
    const specValue = nonEmptyString(item.value);
    if (!label || !specValue) continue;
    specs.push({ label, value: specValue });
  }
  return specs;
}

function parseUpgradeOptions(value: unknown): UpgradeOption[] {
  if (value === undefined || value === null) return [];
  if (!Array.isArray(value)) throw new NormalizerResponseError("upgrade_options is not an array");

  const options: UpgradeOption[] = [];
  for (const item of value) {
    if (!isRecord(item)) continue;
    const label = nonEmptyString(item.label);
    const optionValue = nonEmptyString(item.value);
    if (!label || !optionValue) continue;
    options.push({ label, value: optionValue, price: priceString(item.price) });
  }
  return options;
}

/**
 * Validate the model's report against the record shape. Title and price
 * fall back to the raw block's. A report that keeps none of a block's
 * specs is rejected.
 */
export function parseStructuredRecord(input: unknown, block: RawProductBlock): StructuredRecord {
  if (!isRecord(input)) throw new NormalizerResponseError("Spec sheet report is not an object");

  const mainSpecs = parseMainSpecs(input.main_specs);
  if (mainSpecs.length === 0 && block.specifications.length > 0) {
    throw new NormalizerResponseError(
      `No usable main specs in report (${block.specifications.length} raw specs)`
    );
  }

  return {
    title: nonEmptyString(input.title) ?? block.name,
    price: priceString(input.price) ?? block.price,
    mainSpecs,
    upgradeOptions: parseUpgradeOptions(input.upgrade_options),
  };
}

/** Pull the outermost {...} out of free text and parse it. */
export function extractJsonObject(text: string): unknown {
  const start = text.indexOf("{");
  const end = text.lastIndexOf("}");
  if (start === -1 || end < start) {
    throw new NormalizerResponseError(`No JSON object in response: ${text.slice(0, 100)}`);
  }
  try {
    return JSON.parse(text.slice(start, end + 1));
  } catch {
    throw new NormalizerResponseError(`Invalid JSON in response: ${text.slice(start, start + 100)}`);
  }
}

export function recordFromContent(content: Anthropic.Message["content"], block: RawProductBlock): StructuredRecord {
  for (const part of content) {
    if (part.type === "tool_use" && part.name === REPORT_SPEC_SHEET_TOOL.name) {
      return parseStructuredRecord(part.input, block);
    }
  }

  // No tool call; some models answer with bare JSON instead
  const text = content
    .filter((part): part is Anthropic.TextBlock => part.type === "text")
    .map((part) => part.text)
    .join("");
  return parseStructuredRecord(extractJsonObject(text), block);
}

// ===== Normalizers =====

export function createAnthropicNormalizer(options: AnthropicNormalizerOptions): Normalizer {
  const client = new Anthropic({
    apiKey: options.apiKey,
    timeout: options.timeoutMs,
    maxRetries: 0,
  });

  return async (block) => {
    try {
      const response = await client.messages.create({
        model: options.model,
        max_tokens: options.maxTokens,
        temperature: 0.2,
        tools: [REPORT_SPEC_SHEET_TOOL],
        tool_choice: { type: "tool", name: REPORT_SPEC_SHEET_TOOL.name },
        messages: [{ role: "user", content: buildNormalizePrompt(block) }],
      });

      return { ok: true, record: recordFromContent(response.content, block), model: response.model };
    } catch (err) {
      return { ok: false, error: errorMessage(err) };
    }
  };
}

export const offlineNormalizer: Normalizer = async () => ({
  ok: false,
  error: "normalizer disabled",
});

// ===== Fallback =====

export function fallbackRecord(block: RawProductBlock): StructuredRecord {
  return {
    title: block.name,
    price: block.price,
    mainSpecs: block.specifications.map((spec) => ({ label: spec.label, value: spec.value })),
    upgradeOptions: [],
  };
}

export function resolveRecord(outcome: NormalizeOutcome, block: RawProductBlock): StructuredRecord {
  if (!outcome.ok) return fallbackRecord(block);
  return {
    ...outcome.record,
    title: outcome.record.title || block.name,
  };
}

/**
 * Run the normalizer for one product and always come back with a record.
 * A rejected promise counts as a failed outcome.
 */
export async function normalizeWithFallback(
  normalizer: Normalizer,
  block: RawProductBlock
): Promise<{ record: StructuredRecord; outcome: NormalizeOutcome }> {
  let outcome: NormalizeOutcome;
  try {
    outcome = await normalizer(block);
  } catch (err) {
    outcome = { ok: false, error: errorMessage(err) };
  }

  if (outcome.ok) {
    console.log(`[normalize] ${block.name}: ${outcome.record.mainSpecs.length} specs via ${outcome.model}`);
  } else {
    console.warn(`[normalize] ${block.name}: using raw specs (${outcome.error})`);
  }

  return { record: resolveRecord(outcome, block), outcome };
}
