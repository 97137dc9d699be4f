/**
 * Seed script for blood banks and donation campaigns
 *
 * Run with: npx medusa exec ./src/scripts/seed-blood-donation.ts
 */

import { ExecArgs } from "@medusajs/framework/types"
import { ContainerRegistrationKeys } from "@medusajs/framework/utils"
import { BLOOD_DONATION_MODULE, BloodDonationModuleService } from "../modules/blood-donation"

const HOUR = 60 * 60 * 1000

const DEFAULT_BLOOD_BANKS = [
  {
    name: "City Central Blood Bank",
    location: "123 Main St, Cityville",
    contact_phone: "555-1000",
    operating_hours: "Mon-Fri 8am-6pm, Sat 9am-1pm",
    website: "www.citycentralbb.org",
    inventory: { "A+": 50, "A-": 25, "B+": 30, "B-": 15, "AB+": 10, "AB-": 5, "O+": 60, "O-": 40 },
    inventory_age_hours: 2,
    services_offered: ["Whole Blood", "Platelets", "Plasma"],
  },
  {
    name: "North Regional Donor Center",
    location: "456 North Ave, Northtown",
    contact_phone: "555-2000",
    operating_hours: "Tue-Sat 10am-4pm",
    website: "www.northregionaldc.org",
    inventory: { "A+": 35, "A-": 18, "B+": 22, "B-": 8, "AB+": 5, "AB-": 2, "O+": 45, "O-": 28 },
    inventory_age_hours: 5,
    services_offered: ["Whole Blood", "Power Red"],
  },
  {
    name: "Westside Community Hospital",
    location: "789 West Blvd, Westonia",
    contact_phone: "555-3000",
    operating_hours: "Mon-Fri 9am-5pm",
    website: "www.westsidehospital.com/bloodbank",
    inventory: { "A+": 20, "A-": 10, "B+": 15, "B-": 5, "AB+": 3, "AB-": 1, "O+": 30, "O-": 18 },
    inventory_age_hours: 24,
    services_offered: ["Whole Blood"],
  },
]

const DEFAULT_CAMPAIGNS = [
  {
    title: "Summer Blood Drive",
    description: "Help us meet the summer demand! All donors get a free t-shirt.",
    organizer: "Community Blood Services",
    start_date: "2025-07-15T00:00:00Z",
    end_date: "2025-07-20T23:59:59Z",
    time_details: "10:00 AM - 4:00 PM Daily",
    location: "City Hall Plaza",
    goal_units: 200,
    status: "Upcoming" as const,
    required_blood_groups: null,
  },
  {
    title: "University Challenge - Fall Semester",
    description: "Support your university department and save lives!",
    organizer: "State University & Red Cross",
    start_date: "2025-09-10T00:00:00Z",
    end_date: "2025-09-14T23:59:59Z",
    time_details: "9:00 AM - 5:00 PM Daily",
    location: "State University Campus - Student Union",
    goal_units: 300,
    status: "Upcoming" as const,
    required_blood_groups: ["O-", "O+", "A-"],
  },
  {
    title: "Holiday Heroes Drive",
    description: "Give the gift of life this holiday season.",
    organizer: "Local Red Cross Chapter",
    start_date: "2025-12-01T00:00:00Z",
    end_date: "2025-12-05T23:59:59Z",
    time_details: "11:00 AM - 6:00 PM Daily",
    location: "Downtown Community Center",
    goal_units: 250,
    status: "Upcoming" as const,
    required_blood_groups: null,
  },
]

export default async function seedBloodDonation({ container }: ExecArgs) {
  const logger = container.resolve(ContainerRegistrationKeys.LOGGER)
  const bloodDonationService = container.resolve<BloodDonationModuleService>(BLOOD_DONATION_MODULE)

  logger.info("Seeding blood banks...")
  let banksCreated = 0
  for (const { inventory_age_hours, ...bank } of DEFAULT_BLOOD_BANKS) {
    const existing = await bloodDonationService.listBloodBanks({ name: bank.name })
    if (existing.length > 0) {
      logger.info(`  Skipping existing blood bank: ${bank.name}`)
      continue
    }
    await bloodDonationService.createBloodBanks({
      ...bank,
      last_inventory_update: new Date(Date.now() - inventory_age_hours * HOUR),
    })
    banksCreated++
  }
  logger.info(`Created ${banksCreated} blood banks`)

  logger.info("Seeding campaigns...")
  let campaignsCreated = 0
  for (const campaign of DEFAULT_CAMPAIGNS) {
    const existing = await bloodDonationService.listCampaigns({ title: campaign.title })
    if (existing.length > 0) {
      logger.info(`  Skipping existing campaign: ${campaign.title}`)
      continue
    }
    await bloodDonationService.createCampaigns({
      ...campaign,
      start_date: new Date(campaign.start_date),
      end_date: new Date(campaign.end_date),
    })
    campaignsCreated++
  }
  logger.info(`Created ${campaignsCreated} campaigns`)

  logger.info("Blood donation seed complete!")
}
