/**
 * Error types raised by the scorer.
 *
 * Backend failures (HTTP errors, missing API keys) are thrown by the LLM
 * adapters as plain Errors and propagate unchanged. Only a judge answer
 * that cannot be read is batch-local: the dispatcher catches
 * MalformedResponseError and marks that batch's samples as unjudged.
 */

export class MalformedResponseError extends Error {
  readonly content: string;

  constructor(reason: string, content: string) {
    super(`Malformed judge response: ${reason}`);
    this.name = "MalformedResponseError";
    this.content = content.slice(0, 200);
  }
}

export class SampleStateError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "SampleStateError";
  }
}

export class ConfigError extends Error {
  readonly issues: string[];

  constructor(issues: string[]) {
    super(`Invalid scorer configuration: ${issues.join("; ")}`);
    this.name = "ConfigError";
    this.issues = issues;
  }
}
