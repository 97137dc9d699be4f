import type { Context } from "@medusajs/framework/types"

export const CHECKED_WRITE_ISOLATION = "repeatable read"

/**
 * Context for a write guarded by a precondition. Postgres aborts a
 * repeatable read or serializable transaction that writes a row another
 * transaction committed a change to after its snapshot, so the write fails
 * instead of landing on a state the precondition never saw.
 *
 * Only takes effect when the call opens its own transaction; inside a
 * caller's transaction the caller's isolation level applies.
 */
export function checkedWriteContext(sharedContext: Context): Context {
  if (sharedContext.isolationLevel?.toLowerCase() === "serializable") {
    return sharedContext
  }
  return { ...sharedContext, isolationLevel: CHECKED_WRITE_ISOLATION }
}
