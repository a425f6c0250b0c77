/**
 * Billing Registry
 *
 * Communities, residences and occupants are owned outside the ledger. The
 * registry answers whether an identifier exists within a community before a
 * charge, payment or template is written against it.
 */

import { BillingNotFoundError } from './billing-errors.js';
import type { BillingTarget } from './billing-types.js';

export interface BillingRegistry {
  communityExists(communityId: string): Promise<boolean>;
  residenceExists(communityId: string, residenceId: string): Promise<boolean>;
  occupantExists(communityId: string, occupantId: string): Promise<boolean>;
}

export async function assertCommunityExists(
  registry: BillingRegistry,
  communityId: string
): Promise<void> {
  if (!(await registry.communityExists(communityId))) {
    throw new BillingNotFoundError('community', communityId);
  }
}

/**
 * @throws {BillingNotFoundError} If the community or the target is unknown
 */
export async function assertTargetExists(
  registry: BillingRegistry,
  communityId: string,
  target: BillingTarget
): Promise<void> {
  await assertCommunityExists(registry, communityId);

  switch (target.kind) {
    case 'residence':
      if (!(await registry.residenceExists(communityId, target.residenceId))) {
        throw new BillingNotFoundError('residence', target.residenceId);
      }
      return;
    case 'occupant':
      if (!(await registry.occupantExists(communityId, target.occupantId))) {
        throw new BillingNotFoundError('occupant', target.occupantId);
      }
      return;
  }
}

/**
 * Registry backed by in-process sets, for tests and local tooling
 */
export class InMemoryBillingRegistry implements BillingRegistry {
  private readonly communities = new Set<string>();
  private readonly residences = new Map<string, string>();
  private readonly occupants = new Map<string, string>();

  addCommunity(communityId: string): this {
    this.communities.add(communityId);
    return this;
  }

  addResidence(communityId: string, residenceId: string): this {
    this.communities.add(communityId);
    this.residences.set(residenceId, communityId);
    return this;
  }

  addOccupant(communityId: string, occupantId: string): this {
    this.communities.add(communityId);
    this.occupants.set(occupantId, communityId);
    return this;
  }

  async communityExists(communityId: string): Promise<boolean> {
    return this.communities.has(communityId);
  }

  async residenceExists(communityId: string, residenceId: string): Promise<boolean> {
    return this.residences.get(residenceId) === communityId;
  }

  async occupantExists(communityId: string, occupantId: string): Promise<boolean> {
    return this.occupants.get(occupantId) === communityId;
  }
}
