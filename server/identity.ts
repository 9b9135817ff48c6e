import type { IStorage } from "./storage";
import type { Membership } from "./plugins/types";

export interface IdentityDirectory {
  membershipOf(userId: string): Promise<Membership | null>;
}

export class StorageIdentityDirectory implements IdentityDirectory {
  constructor(private readonly storage: IStorage) {}

  async membershipOf(userId: string): Promise<Membership | null> {
    const membership = await this.storage.getMembership(userId);
    return membership ?? null;
  }
}
