// src/discovery.ts

import type { NetworkAddress } from "./shared_object";

/**
 * Source of addresses worth dialing.
 */
export interface DiscoverySource {
  readonly name: string;
  discover(): Promise<NetworkAddress[]>;
}

/**
 * Fixed list of bootstrap addresses.
 */
export class StaticDiscoverySource implements DiscoverySource {
  readonly name = "static";
  private readonly addresses: NetworkAddress[];

  constructor(addresses: readonly NetworkAddress[]) {
    this.addresses = [...new Set(addresses)];
  }

  async discover(): Promise<NetworkAddress[]> {
    return [...this.addresses];
  }
}

export interface PeerExchangeOptions {
  /** Addresses retained between discovery rounds. Default: 256 */
  maxAddresses?: number;
}

/**
 * Addresses learned from connected peers' `peer_response` messages.
 *
 * `discover` asks connected peers for more through the `requestPeers`
 * callback and hands out, once, whatever arrived since the previous call.
 */
export class PeerExchangeSource implements DiscoverySource {
  readonly name = "peer-exchange";
  private readonly learned = new Set<NetworkAddress>();
  private readonly maxAddresses: number;

  constructor(
    private readonly requestPeers: () => void,
    options: PeerExchangeOptions = {},
  ) {
    this.maxAddresses = options.maxAddresses ?? 256;
  }

  /** Records addresses received from a peer. Extra addresses are ignored. */
  offer(addresses: readonly NetworkAddress[]): number {
    let added = 0;
    for (const address of addresses) {
      if (this.learned.size >= this.maxAddresses) break;
      if (address.length === 0 || this.learned.has(address)) continue;
      this.learned.add(address);
      added++;
    }
    return added;
  }

  get size(): number {
    return this.learned.size;
  }

  async discover(): Promise<NetworkAddress[]> {
    const addresses = Array.from(this.learned);
    this.learned.clear();
    this.requestPeers();
    return addresses;
  }
}
