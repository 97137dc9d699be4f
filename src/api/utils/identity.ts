import { AuthenticatedMedusaRequest } from "@medusajs/framework/http"
import { IdentityContext, resolveIdentity } from "../../modules/access-policy"
import { BLOOD_DONATION_MODULE, BloodDonationModuleService } from "../../modules/blood-donation"

// Resolve who the request runs as from the customer auth context
export async function resolveIdentityContext(
  req: AuthenticatedMedusaRequest
): Promise<IdentityContext> {
  const bloodDonationService = req.scope.resolve<BloodDonationModuleService>(BLOOD_DONATION_MODULE)
  return await resolveIdentity(req.auth_context?.actor_id, bloodDonationService)
}
