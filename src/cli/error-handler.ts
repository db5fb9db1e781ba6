import { AggregatorError } from "../errors.js";

const SQLSTATE = /^[0-9A-Z]{5}$/;

function causeOf(err: unknown): unknown {
  return err && typeof err === "object" && "cause" in err ? err.cause : undefined;
}

/**
 * Finds a PostgreSQL SQLSTATE code on the error or anywhere in its cause
 * chain (store errors wrap the driver's error).
 */
export function getPgErrorCode(err: unknown): string | undefined {
  for (let current = err; current; current = causeOf(current)) {
    if (
      typeof current === "object" &&
      "code" in current &&
      typeof current.code === "string" &&
      SQLSTATE.test(current.code)
    ) {
      return current.code;
    }
  }
  return undefined;
}

function getRootCauseMessage(err: unknown): string | undefined {
  let root: unknown = causeOf(err);
  if (!root) return undefined;
  for (let next = causeOf(root); next; next = causeOf(next)) {
    root = next;
  }
  return root instanceof Error ? root.message : String(root);
}

/**
 * Reports an error that reached the command boundary and returns the exit
 * code for the process.
 */
export function handleCommandError(err: unknown): number {
  if (err instanceof AggregatorError) {
    const code = getPgErrorCode(err);
    const detail = getRootCauseMessage(err);
    const suffix = `${code ? ` [${code}]` : ""}${detail ? `: ${detail}` : ""}`;
    console.error(`Error: ${err.message}${suffix}`);
    return 1;
  }

  console.error("Unexpected error:", err);
  return 1;
}
