import { SubscriberArgs, SubscriberConfig } from "@medusajs/framework"
import { BLOOD_DONATION_MODULE, BloodDonationModuleService } from "../modules/blood-donation"

/**
 * Subscriber that removes a customer's donor profile and everything it owns
 * once the customer (the auth identity behind the profile) is deleted.
 */
export default async function customerDeletedCleanupHandler({
  event: { data },
  container,
}: SubscriberArgs<{ id: string }>) {
  try {
    const bloodDonationService = container.resolve<BloodDonationModuleService>(BLOOD_DONATION_MODULE)

    console.log(`[customer-deleted-cleanup] Purging donor data for customer ID: ${data.id}`)

    const removed = await bloodDonationService.purgeSubject(data.id)
    const summary = removed.map(({ kind, count }) => `${kind}=${count}`).join(", ")

    console.log(`[customer-deleted-cleanup] Removed records for ${data.id}: ${summary}`)
  } catch (error) {
    // The customer is already gone; report and let the deletion stand
    console.error("[customer-deleted-cleanup] Failed to purge donor data:", error)
  }
}

export const config: SubscriberConfig = {
  event: "customer.deleted",
}
