import type { HarnessCommand } from "./types.js";

/**
 * Parse one harness line into a command or an error.
 *
 *   solve <puzzleId> <answer…>   answer may contain spaces
 *   reserve <puzzleId>
 *   status <puzzleId>
 *   map
 *   quit | exit
 */
export function parseCommand(input: string): HarnessCommand | { error: string } {
  const trimmed = input.trim();
  const [verb = "", puzzleId, ...rest] = trimmed.split(/\s+/);

  switch (verb.toLowerCase()) {
    case "solve":
      if (!puzzleId || rest.length === 0) return { error: "solve requires a puzzle id and an answer" };
      return { kind: "solve", puzzleId, answer: rest.join(" ") };
    case "reserve":
      if (!puzzleId) return { error: "reserve requires a puzzle id" };
      return { kind: "reserve", puzzleId };
    case "status":
      if (!puzzleId) return { error: "status requires a puzzle id" };
      return { kind: "status", puzzleId };
    case "map":
      return { kind: "map" };
    case "quit":
    case "exit":
      return { kind: "quit" };
    default:
      return { error: `Unknown command "${verb}". Use solve, reserve, status, map or quit.` };
  }
}

/** Script lines worth running: non-empty and not `//` comments. */
export function scriptLines(content: string): string[] {
  return content
    .split("\n")
    .map((line) => line.trim())
    .filter((line) => line.length > 0 && !line.startsWith("//"));
}
