import { MedusaError } from "@medusajs/framework/utils"
import { PolicyAction, PolicyVerdict, ResourceKind } from "../access-policy/types"

/**
 * Raised by the guarded store when the access policy refuses an action.
 * Carries the full verdict so callers can report `denied_fields` back.
 */
export class PolicyDeniedError extends MedusaError {
  readonly verdict: PolicyVerdict

  constructor(action: PolicyAction, kind: ResourceKind, verdict: PolicyVerdict) {
    super(
      verdict.reason === "not_authenticated"
        ? MedusaError.Types.UNAUTHORIZED
        : MedusaError.Types.NOT_ALLOWED,
      `Not allowed to ${action} ${kind}: ${verdict.reason}`
    )
    this.verdict = verdict
  }
}
