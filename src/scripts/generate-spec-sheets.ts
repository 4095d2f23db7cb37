import "dotenv/config";
import { config, requireAnthropicApiKey } from "../lib/config";
import { parseGenerateArgs, prompt } from "../lib/cli";
import { errorMessage } from "../lib/errors";
import { createAnthropicNormalizer, offlineNormalizer } from "../lib/llm/normalize";
import { generateSpecSheets } from "../lib/pipeline";
import { profiler } from "../lib/profiler";

async function main() {
  const args = parseGenerateArgs(process.argv.slice(2));

  const normalizer = config.enableNormalizer
    ? createAnthropicNormalizer({
        apiKey: requireAnthropicApiKey(),
        model: config.normalizerModel,
        timeoutMs: config.normalizerTimeoutMs,
        maxTokens: config.normalizerMaxTokens,
      })
    : offlineNormalizer;
  if (!config.enableNormalizer) {
    console.log("[generate] Normalizer disabled, using raw specs");
  }

  const templatePath = args.template === true ? config.templatePath : args.template;

  const inputPath =
    args.input ??
    (await prompt(
      "\nPlease specify the markdown file to process:\n(You can drag and drop the file here or type the path)\n> "
    ));
  const outputDir = args.out ?? (await prompt("\nPlease specify the name for the output folder:\n> "));

  const summary = await generateSpecSheets({ inputPath, outputDir, templatePath, normalizer });
  profiler.printSummary();

  console.log(`\nProcessing complete! ${summary.generated.length} of ${summary.productCount} PDFs generated.`);
  console.log(`Files are located in: ${summary.outputDir}`);
  for (const failure of summary.failed) {
    console.log(`  failed: ${failure.productName} (${failure.error})`);
  }
}

main().catch((err) => {
  console.error("[generate] Fatal error:", err);
  console.log(`\nError: ${errorMessage(err)}`);
  console.log("Please check the log output above for details.");
});
