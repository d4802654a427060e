/** Input that a command rejects before touching any store */
export class GameCommandInputError extends Error {
  constructor(
    message: string,
    public readonly issues: ReadonlyArray<string>,
  ) {
    super(message);
    this.name = "GameCommandInputError";
  }

  static because(issues: readonly string[]): GameCommandInputError {
    const [firstIssue] = issues;
    if (issues.length > 1) {
      return new GameCommandInputError(
        `Invalid command input: ${issues.join("; ")}`,
        issues,
      );
    }
    return new GameCommandInputError(firstIssue ?? "Invalid command input", issues);
  }
}
