export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

export class TemplateNotFoundError extends Error {
  constructor(public readonly templatePath: string) {
    super(`Template PDF not found: ${templatePath} (run the create-template script first)`);
    this.name = "TemplateNotFoundError";
  }
}

export class InputReadError extends Error {
  constructor(
    public readonly inputPath: string,
    reason: string
  ) {
    super(`Could not read price list ${inputPath}: ${reason}`);
    this.name = "InputReadError";
  }
}

export class NormalizerResponseError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "NormalizerResponseError";
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
