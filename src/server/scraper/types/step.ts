// ============================================================================
// STEP RESULT
// ============================================================================
// Outcome of one fallible interaction step

export type StepResult<T = void> =
  | { ok: true; value: T }
  | { ok: false; error: unknown };

/**
 * Run `fn` and capture a thrown error as a failed step
 */
export async function attempt<T>(fn: () => Promise<T>): Promise<StepResult<T>> {
  try {
    return { ok: true, value: await fn() };
  } catch (error) {
    return { ok: false, error };
  }
}
