import { AuthenticatedMedusaRequest, MedusaResponse } from "@medusajs/framework/http"
import {
  ACCESS_POLICY_MODULE,
  AccessPolicyModuleService,
  isPolicyAction,
  isResourceKind,
  ResourceDescriptor,
} from "../../../../modules/access-policy"
import { resolveIdentityContext } from "../../../utils/identity"
import { isRecordFields } from "../../../utils/records"

function optionalText(value: unknown): string | null {
  return typeof value === "string" ? value : null
}

/**
 * POST /store/access/check - Ask the policy whether the current caller may act
 *
 * Lets a storefront hide controls the caller could not use anyway.
 *
 * Body: {
 *   action: "create" | "read" | "update" | "delete",
 *   descriptor: { kind, owner_ref?, lifecycle_status?, current_fields?, proposed_fields? }
 * }
 */
export async function POST(req: AuthenticatedMedusaRequest, res: MedusaResponse) {
  const policyService = req.scope.resolve<AccessPolicyModuleService>(ACCESS_POLICY_MODULE)
  const body: unknown = req.body

  const action = isRecordFields(body) ? body.action : undefined
  const raw = isRecordFields(body) ? body.descriptor : undefined

  if (!isPolicyAction(action) || !isRecordFields(raw)) {
    return res.status(400).json({
      message: "action and descriptor are required",
    })
  }

  const { kind, owner_ref, lifecycle_status, current_fields, proposed_fields } = raw
  if (!isResourceKind(kind)) {
    return res.status(400).json({ message: `Unknown resource kind ${String(kind)}` })
  }

  const descriptor: ResourceDescriptor = {
    kind,
    owner_ref: optionalText(owner_ref),
    lifecycle_status: optionalText(lifecycle_status),
    current_fields: isRecordFields(current_fields) ? current_fields : undefined,
    proposed_fields: isRecordFields(proposed_fields) ? proposed_fields : undefined,
  }

  const ctx = await resolveIdentityContext(req)
  return res.json(policyService.evaluate(ctx, action, descriptor))
}
