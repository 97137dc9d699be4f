import { model } from "@medusajs/framework/utils"
import { CAMPAIGN_STATUSES } from "../../../lib/enums"

/**
 * Campaign model - a donation drive or event
 */
export const Campaign = model.define("campaign", {
  id: model.id({ prefix: "camp" }).primaryKey(),
  title: model.text(),
  description: model.text(),
  organizer: model.text(),
  start_date: model.dateTime(),
  end_date: model.dateTime(),
  time_details: model.text().nullable(), // e.g. "10:00 AM - 4:00 PM Daily"
  location: model.text(),
  location_coords: model.json().nullable(),
  image_url: model.text().nullable(),
  goal_units: model.number().default(0),
  collected_units: model.number().default(0),
  status: model.enum([...CAMPAIGN_STATUSES]).default("Upcoming").index(),
  participants_count: model.number().default(0),
  required_blood_groups: model.array().nullable(),
})
