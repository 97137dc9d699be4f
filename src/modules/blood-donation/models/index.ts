export { UserProfile } from "./user-profile"
export { BloodBank } from "./blood-bank"
export { Campaign } from "./campaign"
export { BloodRequest } from "./blood-request"
export { Donation } from "./donation"
export { DonorNotification } from "./donor-notification"
