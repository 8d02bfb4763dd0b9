// src/lib/errors.ts
export class MalformedMetadataError extends Error {
  readonly source?: string;
  readonly issues: string[];

  constructor(issues: string[], source?: string, options?: { cause?: unknown }) {
    const where = source ?? "<input>";
    super(`Malformed front matter in ${where}: ${issues.join("; ")}`, options);
    this.name = "MalformedMetadataError";
    this.source = source;
    this.issues = issues;
  }
}

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}
