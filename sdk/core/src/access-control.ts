import { AuthorizationError, ValidationError } from "./errors";
import type { Journal } from "./journal";
import type { Address, Emit } from "./types";
import { isZeroAddress, sameAddress, toAddress } from "./utils";

/**
 * Single transferable administrator identity.
 */
export class AccessControl {
  private current: Address;

  constructor(
    owner: Address,
    private readonly journal: Journal,
    private readonly emit: Emit
  ) {
    const normalized = toAddress(owner, "owner");
    if (isZeroAddress(normalized)) throw new ValidationError("Owner cannot be the zero address");
    this.current = normalized;
  }

  get owner(): Address {
    return this.current;
  }

  isOwner(caller: Address): boolean {
    return sameAddress(caller, this.current);
  }

  /** Called first by every mutating admin operation. */
  requireOwner(caller: Address): void {
    if (!this.isOwner(caller)) {
      throw new AuthorizationError(`${caller} is not the administrator`);
    }
  }

  transferOwnership(caller: Address, newOwner: Address): void {
    this.requireOwner(caller);
    const next = toAddress(newOwner, "new owner");
    if (isZeroAddress(next)) throw new ValidationError("New owner cannot be the zero address");

    const previousOwner = this.current;
    this.journal.record(() => {
      this.current = previousOwner;
    });
    this.current = next;
    this.emit({ type: "OwnershipTransferred", previousOwner, newOwner: next });
  }
}
