export type ItemOutcome =
  | { status: "written"; input: string; outputPath: string }
  | { status: "empty"; input: string }
  | { status: "missing"; input: string }
  | { status: "failed"; input: string; error: string };

export const EXIT_CODES = {
  success: 0,
  processingError: 1,
  inputMissing: 2,
} as const;

export const resolveExitCode = (outcomes: ItemOutcome[]): number => {
  if (outcomes.some((outcome) => outcome.status === "failed")) {
    return EXIT_CODES.processingError;
  }
  if (outcomes.some((outcome) => outcome.status === "missing")) {
    return EXIT_CODES.inputMissing;
  }
  return EXIT_CODES.success;
};

/**
 * Runs `handler` over every input in order. One item's outcome never stops
 * the next item from running.
 */
export const processFiles = async (
  inputs: string[],
  handler: (input: string) => Promise<ItemOutcome>
): Promise<ItemOutcome[]> => {
  const outcomes: ItemOutcome[] = [];
  const separator = "=".repeat(20);

  for (const [index, input] of inputs.entries()) {
    console.log(
      `\n${separator} Processing file ${index + 1} of ${inputs.length} ${separator}`
    );
    outcomes.push(await handler(input));
  }

  console.log("\nAll files processed.", {
    written: outcomes.filter((outcome) => outcome.status === "written").length,
    empty: outcomes.filter((outcome) => outcome.status === "empty").length,
    missing: outcomes.filter((outcome) => outcome.status === "missing").length,
    failed: outcomes.filter((outcome) => outcome.status === "failed").length,
  });

  return outcomes;
};
