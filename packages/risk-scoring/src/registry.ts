import { Address } from "./types";

export function normalizeAddress(address: string): Address {
  return address.trim().toLowerCase();
}

/**
 * Known-bad and known-good address sets consulted by the scoring engine.
 * An address may sit in both; scoring resolves the overlap.
 */
export class AddressRegistry {
  private readonly blacklist = new Set<Address>();
  private readonly whitelist = new Set<Address>();

  public addToBlacklist(addresses: string[]): Address[] {
    return this.addAll(this.blacklist, addresses);
  }

  public addToWhitelist(addresses: string[]): Address[] {
    return this.addAll(this.whitelist, addresses);
  }

  public removeFromBlacklist(addresses: string[]): Address[] {
    return this.removeAll(this.blacklist, addresses);
  }

  public removeFromWhitelist(addresses: string[]): Address[] {
    return this.removeAll(this.whitelist, addresses);
  }

  public isBlacklisted(address: string): boolean {
    return this.blacklist.has(normalizeAddress(address));
  }

  public isWhitelisted(address: string): boolean {
    return this.whitelist.has(normalizeAddress(address));
  }

  public blacklisted(): Address[] {
    return Array.from(this.blacklist).sort();
  }

  public whitelisted(): Address[] {
    return Array.from(this.whitelist).sort();
  }

  private addAll(target: Set<Address>, addresses: string[]): Address[] {
    const added: Address[] = [];
    for (const address of addresses.map(normalizeAddress)) {
      if (address && !target.has(address)) {
        target.add(address);
        added.push(address);
      }
    }
    return added;
  }

  private removeAll(target: Set<Address>, addresses: string[]): Address[] {
    const removed: Address[] = [];
    for (const address of addresses.map(normalizeAddress)) {
      if (target.delete(address)) {
        removed.push(address);
      }
    }
    return removed;
  }
}
