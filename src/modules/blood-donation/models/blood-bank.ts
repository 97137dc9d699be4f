import { model } from "@medusajs/framework/utils"

export const BloodBank = model.define("blood_bank", {
  id: model.id({ prefix: "bbank" }).primaryKey(),
  name: model.text(),
  location: model.text(),
  location_coords: model.json().nullable(), // { lat, lng }
  contact_phone: model.text().nullable(),
  operating_hours: model.text().nullable(),
  website: model.text().nullable(),
  inventory: model.json().default({}), // blood group -> units on hand
  last_inventory_update: model.dateTime().nullable(),
  services_offered: model.array().nullable(),
})
