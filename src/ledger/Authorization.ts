import { LedgerError, LedgerErrorCode } from '../model/Errors';
import { toAddress } from '../utils/TokenUtils';

export enum CoreRoles {
  GOVERNOR = 'GOVERNOR',
  GAUGE_ADD = 'GAUGE_ADD',
  GAUGE_REMOVE = 'GAUGE_REMOVE',
  GAUGE_PARAMETERS = 'GAUGE_PARAMETERS',
  GAUGE_PNL_NOTIFIER = 'GAUGE_PNL_NOTIFIER',
  TOKEN_MINTER = 'TOKEN_MINTER',
  RATE_LIMITED_MINTER = 'RATE_LIMITED_MINTER'
}

export interface Authorizer {
  hasRole(role: CoreRoles, account: string): boolean;
}

/**
 * In-memory role table. Role administration itself is not part of the ledger
 * transaction: grants take effect immediately.
 */
export class RoleRegistry implements Authorizer {
  private readonly members = new Map<CoreRoles, Set<string>>();

  grantRole(role: CoreRoles, account: string) {
    const members = this.members.get(role) || new Set<string>();
    members.add(toAddress(account));
    this.members.set(role, members);
  }

  revokeRole(role: CoreRoles, account: string) {
    this.members.get(role)?.delete(toAddress(account));
  }

  hasRole(role: CoreRoles, account: string): boolean {
    return this.members.get(role)?.has(toAddress(account)) || false;
  }
}

export function requireRole(authorizer: Authorizer, role: CoreRoles, caller: string, context: string) {
  if (!authorizer.hasRole(role, caller)) {
    throw new LedgerError(LedgerErrorCode.Unauthorized, `${context}: ${caller} does not have role ${role}`);
  }
}
