import { createInterface } from "readline/promises";

export interface GenerateArgs {
  input?: string;
  out?: string;
  /** true = use the configured template path */
  template?: string | true;
}

/** Paths dragged into a terminal arrive wrapped in quotes. */
export function stripQuotes(value: string): string {
  return value.trim().replace(/^["']+|["']+$/g, "").trim();
}

export function parseGenerateArgs(args: string[]): GenerateArgs {
  const parsed: GenerateArgs = {};

  for (let i = 0; i < args.length; i++) {
    const next = args[i + 1];
    const hasValue = next !== undefined && !next.startsWith("--");

    if (args[i] === "--input" && hasValue) {
      parsed.input = stripQuotes(next);
      i++;
    } else if (args[i] === "--out" && hasValue) {
      parsed.out = stripQuotes(next);
      i++;
    } else if (args[i] === "--template") {
      if (hasValue) {
        parsed.template = stripQuotes(next);
        i++;
      } else {
        parsed.template = true;
      }
    }
  }

  return parsed;
}

export function parseOutArg(args: string[]): string | undefined {
  const idx = args.indexOf("--out");
  const value = idx === -1 ? undefined : args[idx + 1];
  return value ? stripQuotes(value) : undefined;
}

export async function prompt(question: string): Promise<string> {
  const rl = createInterface({ input: process.stdin, output: process.stdout });
  try {
    return stripQuotes(await rl.question(question));
  } finally {
    rl.close();
  }
}
