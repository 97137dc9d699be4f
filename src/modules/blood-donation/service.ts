import type { Context } from "@medusajs/framework/types"
import {
  InjectManager,
  InjectTransactionManager,
  MedusaContext,
  MedusaError,
  MedusaService,
} from "@medusajs/framework/utils"
import type { RecordFields, ResourceKind, UserRole } from "../access-policy/types"
import type { RecordSource } from "./guarded-store"
import {
  BloodBank,
  BloodRequest,
  Campaign,
  Donation,
  DonorNotification,
  UserProfile,
} from "./models"
import { checkedWriteContext } from "./isolation"
import { purgeOwnedRecords } from "./purge"
import type { PurgeCount } from "./purge"
import { keyFieldOf, profileRole } from "./resources"
import type { StoredRecord } from "./resources"

export class BloodDonationModuleService
  extends MedusaService({
    UserProfile,
    BloodBank,
    Campaign,
    BloodRequest,
    Donation,
    DonorNotification,
  })
  implements RecordSource
{
  /** Role of a signed-in caller, see `profileRole`. */
  async resolveRole(uid: string): Promise<UserRole> {
    const [profile] = await this.listUserProfiles({ uid })
    return profileRole(profile)
  }

  @InjectManager()
  async listRecords(
    kind: ResourceKind,
    filters: RecordFields,
    @MedusaContext() sharedContext: Context = {}
  ): Promise<StoredRecord[]> {
    return await this.list_(kind, filters, sharedContext)
  }

  @InjectManager()
  async retrieveRecord(
    kind: ResourceKind,
    key: string,
    @MedusaContext() sharedContext: Context = {}
  ): Promise<StoredRecord | null> {
    const [record] = await this.list_(kind, { [keyFieldOf(kind)]: key }, sharedContext)
    return record ?? null
  }

  @InjectTransactionManager()
  async createRecord(
    kind: ResourceKind,
    data: RecordFields,
    @MedusaContext() sharedContext: Context = {}
  ): Promise<StoredRecord> {
    switch (kind) {
      case "User":
        return await this.createUserProfiles(data, sharedContext)
      case "BloodBank":
        return await this.createBloodBanks(data, sharedContext)
      case "Campaign":
        return await this.createCampaigns(data, sharedContext)
      case "BloodRequest":
        return await this.createBloodRequests(data, sharedContext)
      case "Donation":
        return await this.createDonations(data, sharedContext)
      case "Notification":
        return await this.createDonorNotifications(data, sharedContext)
    }
  }

  /**
   * Reads the stored record, runs `precondition` on it and writes the patch
   * in one repeatable read transaction. A concurrent change to the row
   * between the read and the write aborts the write.
   */
  @InjectManager()
  async updateRecord(
    kind: ResourceKind,
    key: string,
    patch: RecordFields,
    precondition: (current: StoredRecord) => void,
    @MedusaContext() sharedContext: Context = {}
  ): Promise<StoredRecord> {
    return await this.updateRecord_(kind, key, patch, precondition, checkedWriteContext(sharedContext))
  }

  @InjectManager()
  async deleteRecord(
    kind: ResourceKind,
    key: string,
    precondition: (current: StoredRecord) => void,
    @MedusaContext() sharedContext: Context = {}
  ): Promise<void> {
    await this.deleteRecord_(kind, key, precondition, checkedWriteContext(sharedContext))
  }

  @InjectTransactionManager()
  async purgeSubject(
    uid: string,
    @MedusaContext() sharedContext: Context = {}
  ): Promise<PurgeCount[]> {
    return await purgeOwnedRecords(
      {
        list: (kind, filters) => this.list_(kind, filters, sharedContext),
        remove: (kind, keys) => this.delete_(kind, keys, sharedContext),
      },
      uid
    )
  }

  @InjectTransactionManager()
  protected async updateRecord_(
    kind: ResourceKind,
    key: string,
    patch: RecordFields,
    precondition: (current: StoredRecord) => void,
    @MedusaContext() sharedContext: Context = {}
  ): Promise<StoredRecord> {
    const current = await this.currentRecord_(kind, key, sharedContext)
    precondition(current)

    const data = { ...patch, [keyFieldOf(kind)]: key }
    switch (kind) {
      case "User":
        return await this.updateUserProfiles(data, sharedContext)
      case "BloodBank":
        return await this.updateBloodBanks(data, sharedContext)
      case "Campaign":
        return await this.updateCampaigns(data, sharedContext)
      case "BloodRequest":
        return await this.updateBloodRequests(data, sharedContext)
      case "Donation":
        return await this.updateDonations(data, sharedContext)
      case "Notification":
        return await this.updateDonorNotifications(data, sharedContext)
    }
  }

  @InjectTransactionManager()
  protected async deleteRecord_(
    kind: ResourceKind,
    key: string,
    precondition: (current: StoredRecord) => void,
    @MedusaContext() sharedContext: Context = {}
  ): Promise<void> {
    const current = await this.currentRecord_(kind, key, sharedContext)
    precondition(current)
    await this.delete_(kind, [key], sharedContext)
  }

  protected async currentRecord_(
    kind: ResourceKind,
    key: string,
    sharedContext: Context
  ): Promise<StoredRecord> {
    const [current] = await this.list_(kind, { [keyFieldOf(kind)]: key }, sharedContext)
    if (!current) {
      throw new MedusaError(MedusaError.Types.NOT_FOUND, `${kind} with key ${key} was not found`)
    }
    return current
  }

  protected async list_(
    kind: ResourceKind,
    filters: RecordFields,
    sharedContext: Context
  ): Promise<StoredRecord[]> {
    switch (kind) {
      case "User":
        return await this.listUserProfiles(filters, {}, sharedContext)
      case "BloodBank":
        return await this.listBloodBanks(filters, {}, sharedContext)
      case "Campaign":
        return await this.listCampaigns(filters, {}, sharedContext)
      case "BloodRequest":
        return await this.listBloodRequests(filters, {}, sharedContext)
      case "Donation":
        return await this.listDonations(filters, {}, sharedContext)
      case "Notification":
        return await this.listDonorNotifications(filters, {}, sharedContext)
    }
  }

  protected async delete_(kind: ResourceKind, keys: string[], sharedContext: Context): Promise<void> {
    switch (kind) {
      case "User":
        return await this.deleteUserProfiles(keys, sharedContext)
      case "BloodBank":
        return await this.deleteBloodBanks(keys, sharedContext)
      case "Campaign":
        return await this.deleteCampaigns(keys, sharedContext)
      case "BloodRequest":
        return await this.deleteBloodRequests(keys, sharedContext)
      case "Donation":
        return await this.deleteDonations(keys, sharedContext)
      case "Notification":
        return await this.deleteDonorNotifications(keys, sharedContext)
    }
  }
}
