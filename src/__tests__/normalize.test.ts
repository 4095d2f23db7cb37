import { describe, it, expect, vi, beforeEach } from "vitest";
import type Anthropic from "@anthropic-ai/sdk";
import type { RawProductBlock } from "../lib/types";

const { mockCreate, clientOptions } = vi.hoisted(() => ({
  mockCreate: vi.fn(),
  clientOptions: [] as unknown[],
}));

vi.mock("@anthropic-ai/sdk", () => ({
  default: class {
    messages = { create: mockCreate };
    constructor(options: unknown) {
      clientOptions.push(options);
    }
  },
}));

import {
  buildNormalizePrompt,
  createAnthropicNormalizer,
  extractJsonObject,
  fallbackRecord,
  normalizeWithFallback,
  offlineNormalizer,
  parseStructuredRecord,
  recordFromContent,
} from "../lib/llm/normalize";
import { NormalizerResponseError } from "../lib/errors";

const block: RawProductBlock = {
  name: "Model X Base Configuration",
  price: "999",
  specifications: [
    { label: "Processor", value: "Intel Core i7 processor" },
    { label: "Other", value: "Black chassis" },
  ],
};

const report = {
  title: "Model X",
  price: "999",
  main_specs: [{ label: "Processor", value: "Intel Core i7" }],
  upgrade_options: [{ label: "Memory", value: "32 GB", price: "150" }],
};

function toolUse(input: unknown): Anthropic.Message["content"] {
  return [{ type: "tool_use", id: "toolu_test", name: "report_spec_sheet", input }];
}

function text(body: string): Anthropic.Message["content"] {
  return [{ type: "text", text: body, citations: null }];
}

beforeEach(() => {
  mockCreate.mockReset();
  vi.spyOn(console, "log").mockImplementation(() => {});
  vi.spyOn(console, "warn").mockImplementation(() => {});
});

describe("buildNormalizePrompt", () => {
  it("lists the raw specs and price", () => {
    const prompt = buildNormalizePrompt(block);
    expect(prompt).toContain("Product: Model X Base Configuration");
    expect(prompt).toContain("Price: $999");
    expect(prompt).toContain("Processor: Intel Core i7 processor\nOther: Black chassis");
  });

  it("says N/A when there is no price", () => {
    expect(buildNormalizePrompt({ ...block, price: null })).toContain("Price: $N/A");
  });
});

describe("parseStructuredRecord", () => {
  it("maps a complete report", () => {
    expect(parseStructuredRecord(report, block)).toEqual({
      title: "Model X",
      price: "999",
      mainSpecs: [{ label: "Processor", value: "Intel Core i7" }],
      upgradeOptions: [{ label: "Memory", value: "32 GB", price: "150" }],
    });
  });

  it("falls back to the block's title and price", () => {
    const record = parseStructuredRecord({ ...report, title: "  ", price: null }, block);
    expect([record.title, record.price]).toEqual(["Model X Base Configuration", "999"]);
  });

  it.each([
    ["$1,299", "1299"],
    [1299, "1299"],
    ["1299.00", "1299.00"],
  ])("normalizes price %j to %j", (price, expected) => {
    expect(parseStructuredRecord({ ...report, price }, block).price).toBe(expected);
  });

  it.each([["None"], ["N/A"]])("treats %j as no price", (price) => {
    expect(parseStructuredRecord({ ...report, price }, { ...block, price: null }).price).toBeNull();
  });

  it("drops main specs with unknown labels or empty values", () => {
    const record = parseStructuredRecord(
      {
        ...report,
        main_specs: [
          { label: "Processor", value: "Intel Core i7" },
          { label: "Chassis", value: "Aluminium" },
          { label: "Memory", value: "" },
          "Storage: 512GB",
        ],
      },
      block
    );
    expect(record.mainSpecs).toEqual([{ label: "Processor", value: "Intel Core i7" }]);
  });

  it("maps main spec labels to their categories regardless of case", () => {
    const record = parseStructuredRecord(
      {
        title: "M",
        main_specs: [
          { label: "processor", value: "Intel Core i7" },
          { label: "MEMORY", value: "16 GB DDR5" },
        ],
      },
      block
    );
    expect(record.mainSpecs).toEqual([
      { label: "Processor", value: "Intel Core i7" },
      { label: "Memory", value: "16 GB DDR5" },
    ]);
  });

  it("rejects a report that keeps none of the block's specs", () => {
    expect(() =>
      parseStructuredRecord({ ...report, main_specs: [{ label: "Chassis", value: "Aluminium" }] }, block)
    ).toThrow("No usable main specs in report (2 raw specs)");
  });

  it("accepts an empty report for a block without specs", () => {
    const record = parseStructuredRecord({ ...report, main_specs: [] }, { ...block, specifications: [] });
    expect(record.mainSpecs).toEqual([]);
  });

  it("allows missing upgrade options and unpriced upgrades", () => {
    expect(parseStructuredRecord({ ...report, upgrade_options: undefined }, block).upgradeOptions).toEqual([]);
    expect(
      parseStructuredRecord({ ...report, upgrade_options: [{ label: "Storage", value: "1TB", price: "N/A" }] }, block)
        .upgradeOptions
    ).toEqual([{ label: "Storage", value: "1TB", price: null }]);
  });

  it("rejects reports of the wrong shape", () => {
    expect(() => parseStructuredRecord("text", block)).toThrow(NormalizerResponseError);
    expect(() => parseStructuredRecord({ ...report, main_specs: "none" }, block)).toThrow("main_specs is not an array");
    expect(() => parseStructuredRecord({ ...report, upgrade_options: {} }, block)).toThrow(
      "upgrade_options is not an array"
    );
  });
});

describe("extractJsonObject", () => {
  it("finds the object inside surrounding prose", () => {
    expect(extractJsonObject('Here you go:\n{"title": "Model X"}\nDone.')).toEqual({ title: "Model X" });
  });

  it("throws when there is no object", () => {
    expect(() => extractJsonObject("no json here")).toThrow("No JSON object in response");
  });

  it("throws on malformed JSON", () => {
    expect(() => extractJsonObject("{title: Model X}")).toThrow("Invalid JSON in response");
  });
});

describe("recordFromContent", () => {
  it("reads the tool call", () => {
    expect(recordFromContent(toolUse(report), block).title).toBe("Model X");
  });

  it("reads JSON from text when there is no tool call", () => {
    const record = recordFromContent(text(JSON.stringify({ ...report, title: "From text" })), block);
    expect(record.title).toBe("From text");
  });
});

describe("createAnthropicNormalizer", () => {
  const options = { apiKey: "test-key", model: "claude-test", timeoutMs: 5000, maxTokens: 512 };

  it("builds the client without retries and with the timeout", () => {
    createAnthropicNormalizer(options);
    expect(clientOptions[clientOptions.length - 1]).toEqual({ apiKey: "test-key", timeout: 5000, maxRetries: 0 });
  });

  it("forces the report tool and returns the record", async () => {
    mockCreate.mockResolvedValue({ model: "claude-test-001", content: toolUse(report) });

    const outcome = await createAnthropicNormalizer(options)(block);

    expect(outcome).toEqual({
      ok: true,
      model: "claude-test-001",
      record: {
        title: "Model X",
        price: "999",
        mainSpecs: [{ label: "Processor", value: "Intel Core i7" }],
        upgradeOptions: [{ label: "Memory", value: "32 GB", price: "150" }],
      },
    });
    expect(mockCreate).toHaveBeenCalledWith(
      expect.objectContaining({
        model: "claude-test",
        max_tokens: 512,
        tool_choice: { type: "tool", name: "report_spec_sheet" },
      })
    );
  });

  it("reports API errors as a failed outcome", async () => {
    mockCreate.mockRejectedValue(new Error("overloaded"));
    expect(await createAnthropicNormalizer(options)(block)).toEqual({ ok: false, error: "overloaded" });
  });

  it("reads lowercase labels from a JSON text reply", async () => {
    mockCreate.mockResolvedValue({
      model: "claude-test-001",
      content: text(JSON.stringify({ title: "M", main_specs: [{ label: "processor", value: "Intel Core i7" }] })),
    });

    const outcome = await createAnthropicNormalizer(options)(block);

    expect(outcome.ok && outcome.record.mainSpecs).toEqual([{ label: "Processor", value: "Intel Core i7" }]);
  });

  it("fails when the reply keeps no main specs, so the raw specs are used", async () => {
    mockCreate.mockResolvedValue({
      model: "claude-test-001",
      content: toolUse({ ...report, main_specs: [{ label: "Chassis", value: "Aluminium" }] }),
    });

    const { record, outcome } = await normalizeWithFallback(createAnthropicNormalizer(options), block);

    expect(outcome).toEqual({ ok: false, error: "No usable main specs in report (2 raw specs)" });
    expect(record).toEqual(fallbackRecord(block));
  });

  it("reports unusable responses as a failed outcome", async () => {
    mockCreate.mockResolvedValue({ model: "claude-test-001", content: text("I cannot help with that.") });
    const outcome = await createAnthropicNormalizer(options)(block);
    expect(outcome.ok).toBe(false);
  });
});

describe("fallbackRecord", () => {
  it("uses the raw pairs as main specs with no upgrades", () => {
    expect(fallbackRecord(block)).toEqual({
      title: "Model X Base Configuration",
      price: "999",
      mainSpecs: [
        { label: "Processor", value: "Intel Core i7 processor" },
        { label: "Other", value: "Black chassis" },
      ],
      upgradeOptions: [],
    });
  });
});

describe("normalizeWithFallback", () => {
  it("falls back when the normalizer throws", async () => {
    const { record, outcome } = await normalizeWithFallback(async () => {
      throw new Error("boom");
    }, block);

    expect(outcome).toEqual({ ok: false, error: "boom" });
    expect(record).toEqual(fallbackRecord(block));
  });

  it("falls back when the normalizer is disabled", async () => {
    const { record, outcome } = await normalizeWithFallback(offlineNormalizer, block);
    expect(outcome).toEqual({ ok: false, error: "normalizer disabled" });
    expect(record.mainSpecs).toHaveLength(2);
  });

  it("uses the normalized record on success", async () => {
    const normalized = parseStructuredRecord(report, block);
    const { record } = await normalizeWithFallback(
      async () => ({ ok: true, record: normalized, model: "claude-test-001" }),
      block
    );
    expect(record).toEqual(normalized);
  });
});
