/**
 * Promote a donor profile to the admin role
 *
 * Run with: npx medusa exec ./src/scripts/grant-admin.ts <customer-id>
 *
 * Admins cannot be made through the store API (a profile's own role is
 * locked), so the first one has to come from here.
 */

import { ExecArgs } from "@medusajs/framework/types"
import { ContainerRegistrationKeys, MedusaError } from "@medusajs/framework/utils"
import { BLOOD_DONATION_MODULE, BloodDonationModuleService } from "../modules/blood-donation"

export default async function grantAdmin({ container, args }: ExecArgs) {
  const logger = container.resolve(ContainerRegistrationKeys.LOGGER)
  const bloodDonationService = container.resolve<BloodDonationModuleService>(BLOOD_DONATION_MODULE)

  const [uid] = args
  if (!uid) {
    throw new MedusaError(MedusaError.Types.INVALID_ARGUMENT, "Usage: grant-admin <customer-id>")
  }

  const [profile] = await bloodDonationService.listUserProfiles({ uid })
  if (profile) {
    await bloodDonationService.updateUserProfiles({ uid, role: "admin" })
    logger.info(`Promoted existing profile ${uid} to admin`)
  } else {
    await bloodDonationService.createUserProfiles({ uid, role: "admin" })
    logger.info(`Created admin profile for ${uid}`)
  }
}
