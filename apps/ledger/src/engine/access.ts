/**
 * Access policy — who may invoke which operation.
 *
 * Authentication (proving the caller owns an identity) is the host's
 * job; this only decides what an authenticated caller may do.
 */

import type { AccountId } from "@tithe/rules";

export interface AccessPolicy {
  readonly admin: AccountId;
  isAdmin(caller: AccountId): boolean;
  /** Owner or administrator. */
  canManage(caller: AccountId, account: AccountId): boolean;
}

export function createAccessPolicy(admin: AccountId): AccessPolicy {
  return {
    admin,
    isAdmin: (caller) => caller === admin,
    canManage: (caller, account) => caller === account || caller === admin,
  };
}
