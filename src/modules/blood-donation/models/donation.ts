import { model } from "@medusajs/framework/utils"
import { DONATION_TYPES } from "../../../lib/enums"

/**
 * Donation model - recorded by staff, never by the donor
 */
export const Donation = model.define("donation", {
  id: model.id({ prefix: "don" }).primaryKey(),
  donor_uid: model.text().index(),
  donation_date: model.dateTime(),
  donation_type: model.enum([...DONATION_TYPES]),
  location_name: model.text(), // bank name or campaign title
  campaign_id: model.text().nullable(),
  blood_bank_id: model.text().nullable(),
  notes: model.text().nullable(),
})
