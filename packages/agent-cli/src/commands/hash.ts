import { readFileSync } from "fs";
import { ValidationError, digest } from "@agent-escrow/core";

export interface HashOptions {
  file?: string;
}

export function parseJsonArgument(text: string, label: string): unknown {
  try {
    return JSON.parse(text);
  } catch (error) {
    throw new ValidationError(`${label} is not valid JSON`, [], { cause: error });
  }
}

/** Prints the content digest of a JSON document given inline or in a file. */
export function hashCommand(
  json: string | undefined,
  options: HashOptions,
  print: (line: string) => void
): string {
  if (json === undefined && options.file === undefined) {
    throw new ValidationError("Nothing to hash", ["pass a JSON argument or --file <path>"]);
  }
  const text = options.file !== undefined ? readFileSync(options.file, "utf-8") : (json ?? "");
  const hash = digest(parseJsonArgument(text, options.file ?? "input"));
  print(hash);
  return hash;
}
