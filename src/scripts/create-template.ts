import "dotenv/config";
import { writeFile } from "fs/promises";
import { config } from "../lib/config";
import { parseOutArg } from "../lib/cli";
import { errorMessage } from "../lib/errors";
import { createTemplatePdf } from "../lib/pdf/template";

async function main() {
  const templatePath = parseOutArg(process.argv.slice(2)) ?? config.templatePath;

  console.log("[template] Creating template");
  await writeFile(templatePath, await createTemplatePdf());
  console.log(`[template] Template created: ${templatePath}`);

  console.log("\nInstructions:");
  console.log(`1. Open ${templatePath} in your PDF editor`);
  console.log("2. Add your header content in the gray header area");
  console.log("3. Add your footer content in the gray footer area");
  console.log("4. Save the modified template");
  console.log("5. Run generate-spec-sheets with --template");
  console.log("\nNote: Do not modify the content area between the markers");
}

main().catch((err) => {
  console.error("[template] Fatal error:", err);
  console.log(`\nError: ${errorMessage(err)}`);
});
