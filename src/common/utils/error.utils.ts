/**
 * Error Utilities
 */

/** Normalize anything caught into an Error, keeping Error instances as they are */
export function asError(e: unknown): Error {
  if (e instanceof Error) {
    return e;
  }
  return new Error(`Non-error object thrown: ${typeof e === "string" ? e : JSON.stringify(e)}`);
}

