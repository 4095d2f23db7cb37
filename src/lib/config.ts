import { ConfigError } from "./errors";

export const config = {
  anthropicApiKey: process.env.ANTHROPIC_API_KEY || "",
  normalizerModel: process.env.NORMALIZER_MODEL || "claude-haiku-4-5-20251001",
  normalizerTimeoutMs: parseInt(process.env.NORMALIZER_TIMEOUT_MS || "60000", 10),
  normalizerMaxTokens: parseInt(process.env.NORMALIZER_MAX_TOKENS || "2048", 10),
  enableNormalizer: process.env.ENABLE_NORMALIZER !== "false",
  maxConcurrentProducts: parseInt(process.env.MAX_CONCURRENT_PRODUCTS || "3", 10),
  templatePath: process.env.TEMPLATE_PATH || "template.pdf",
};

export function requireAnthropicApiKey(): string {
  if (!config.anthropicApiKey) {
    throw new ConfigError("ANTHROPIC_API_KEY not set (add it to .env or the environment)");
  }
  return config.anthropicApiKey;
}
