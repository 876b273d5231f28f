import { assertNever } from "@arbor/treematch-core";
import { conflictsMatch, containsMatch, equivalentMatch, merge, type ContainsOptions, type Match } from "@arbor/treematch";

export const COMMANDS = ["contains", "equivalent", "conflicts", "merge"] as const;

export type Command = (typeof COMMANDS)[number];

export type CommandResult =
  | {
      kind: "relation";
      command: Exclude<Command, "merge">;
      holds: boolean;
      match: Match;
    }
  | {
      kind: "merge";
      merged: unknown;
    };

/**
 * Run one command over two parsed documents.
 *
 * `conflicts` holds when merging v2 into v1 changes one of v1's values; its
 * match explains where.
 */
export function runCommand(command: Command, v1: unknown, v2: unknown, options: ContainsOptions): CommandResult {
  switch (command) {
    case "contains": {
      const match = containsMatch(v1, v2, options);
      return { kind: "relation", command, holds: match.matches, match };
    }
    case "equivalent": {
      const match = equivalentMatch(v1, v2, options);
      return { kind: "relation", command, holds: match.matches, match };
    }
    case "conflicts": {
      const match = conflictsMatch(v1, v2, options);
      return { kind: "relation", command, holds: !match.matches, match };
    }
    case "merge":
      return { kind: "merge", merged: merge(v1, v2) };
    default:
      return assertNever(command, "Unknown command");
  }
}
