interface CommandErrorMessages {
  /** Used when the binary is not on `PATH`. */
  notFound: string;
  /** Prefixed to the command's stderr, or to the error message when stderr is empty. */
  failurePrefix: string;
}

export function createCommandError(error: unknown, messages: CommandErrorMessages): Error {
  if (readStringProperty(error, "code") === "ENOENT") {
    return new Error(messages.notFound);
  }

  const stderr = readStringProperty(error, "stderr")?.trim();
  const detail =
    stderr && stderr.length > 0 ? stderr : error instanceof Error ? error.message : String(error);

  return new Error(`${messages.failurePrefix}: ${detail}`);
}

function readStringProperty(error: unknown, key: "code" | "stderr"): string | undefined {
  if (typeof error !== "object" || error === null) return undefined;
  const value: unknown = Reflect.get(error, key);
  return typeof value === "string" ? value : undefined;
}
