import { Data } from "effect";

export class ValidationError extends Data.TaggedError("ValidationError")<{
  readonly issues: readonly string[];
  readonly message: string;
}> {
  public static fromIssues(issues: readonly string[]): ValidationError {
    return new ValidationError({
      issues,
      message: `Invalid calculator input: ${issues.join("; ")}`,
    });
  }
}
