/**
 * AdminGate: turns a caller identity into an AdminCapability.
 *
 * Privileged oracle operations take the capability as an explicit argument and ask the
 * gate to verify it; only capabilities minted by this gate instance pass.
 */

import { YieldOracleError } from '../errors/YieldOracleError.js';

/** Identity assigned to API-key callers; always privileged */
export const OPERATOR_IDENTITY = 'operator';

export interface AdminCapability {
  readonly caller: string;
  readonly issuedAt: number;
}

export class AdminGate {
  private readonly admins: Set<string>;
  private readonly issued = new WeakSet<AdminCapability>();

  constructor(admins: Iterable<string> = []) {
    this.admins = new Set([OPERATOR_IDENTITY]);
    for (const admin of admins) {
      this.admins.add(admin.trim().toLowerCase());
    }
  }

  public isAdmin(caller: string | undefined): boolean {
    return caller !== undefined && this.admins.has(caller.trim().toLowerCase());
  }

  /**
   * @throws YieldOracleError Unauthorized when the caller is not an admin
   */
  public authorize(caller: string | undefined): AdminCapability {
    if (!this.isAdmin(caller) || caller === undefined) {
      throw new YieldOracleError('Unauthorized', 'Caller is not authorized for this operation', { caller });
    }

    const capability: AdminCapability = Object.freeze({
      caller: caller.trim().toLowerCase(),
      issuedAt: Date.now()
    });
    this.issued.add(capability);
    return capability;
  }

  public verify(capability: AdminCapability): void {
    if (!this.issued.has(capability)) {
      throw new YieldOracleError('Unauthorized', 'Capability was not issued by this gate', {
        caller: capability.caller
      });
    }
  }
}
