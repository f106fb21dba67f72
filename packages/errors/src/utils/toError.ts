/**
 * Coerces a thrown value into an `Error`.
 *
 * @param problem - Whatever was thrown.
 * @returns The value itself if it is an `Error`, otherwise a new `Error`
 * wrapping it as the cause.
 */
export function toError(problem: unknown): Error {
  if (problem instanceof Error) {
    return problem;
  }
  return new Error(String(problem), { cause: problem });
}
