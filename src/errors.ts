import type { ZodError } from "zod";

export interface ConfigIssue {
  path: string;
  message: string;
}

/**
 * Raised when a GenerationConfig cannot be compiled. Front ends recover by
 * showing `issues` and asking the user again.
 */
export class InvalidConfigError extends Error {
  readonly issues: ConfigIssue[];

  constructor(message: string, issues: ConfigIssue[] = []) {
    super(message);
    this.name = "InvalidConfigError";
    this.issues = issues;
  }

  static fromZod(error: ZodError): InvalidConfigError {
    const issues = error.issues.map((issue) => ({
      path: issue.path.length > 0 ? issue.path.join(".") : "(root)",
      message: issue.message,
    }));
    const summary = issues.map((i) => `${i.path}: ${i.message}`).join("; ");
    return new InvalidConfigError(`Invalid generation config: ${summary}`, issues);
  }
}

export type ModelErrorKind =
  | "rate_limit"
  | "auth"
  | "timeout"
  | "aborted"
  | "network"
  | "empty_response"
  | "upstream";

export class ModelCallError extends Error {
  readonly kind: ModelErrorKind;
  readonly status?: number;

  constructor(kind: ModelErrorKind, message: string, options: { status?: number; cause?: unknown } = {}) {
    super(message, { cause: options.cause });
    this.name = "ModelCallError";
    this.kind = kind;
    this.status = options.status;
  }
}
