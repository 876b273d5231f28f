import type { CommandResult } from "../run.js";

export function formatJsonResult(result: CommandResult): string {
  if (result.kind === "merge") {
    return JSON.stringify(result.merged, null, 2);
  }

  const { match } = result;
  return JSON.stringify(
    {
      command: result.command,
      holds: result.holds,
      ...(match.message ? { path: match.path, message: match.message } : {})
    },
    null,
    2
  );
}
