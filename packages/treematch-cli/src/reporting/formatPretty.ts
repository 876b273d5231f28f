import YAML from "yaml";

import type { CommandResult } from "../run.js";

const VERDICTS = {
  contains: ["v1 contains v2", "v1 does not contain v2"],
  equivalent: ["v1 is equivalent to v2", "v1 is not equivalent to v2"],
  conflicts: ["v2 conflicts with v1", "no conflicts"]
} as const;

export function formatPrettyResult(result: CommandResult): string {
  if (result.kind === "merge") {
    return YAML.stringify(result.merged).trimEnd();
  }

  const [holds, fails] = VERDICTS[result.command];
  const verdict = result.holds ? holds : fails;
  return result.match.message ? `${verdict}\n\n${result.match.message}` : verdict;
}
