import { Bech32String } from '../types';

export interface Subscription {
  subscriberId: string;
  /** Address text as the subscriber entered it; validated per cycle. */
  address: Bech32String;
}

/** Read side of whatever holds the bot's subscriptions. */
export interface SubscriptionStore {
  listSubscriptions(): Promise<readonly Subscription[]>;
}

export class InMemorySubscriptionStore implements SubscriptionStore {
  private readonly subscribers = new Map<Bech32String, Set<string>>();

  constructor(initial: readonly Subscription[] = []) {
    initial.forEach(({ subscriberId, address }) => this.subscribe(subscriberId, address));
  }

  subscribe(subscriberId: string, address: Bech32String): void {
    const existing = this.subscribers.get(address);
    if (existing) {
      existing.add(subscriberId);
    } else {
      this.subscribers.set(address, new Set([subscriberId]));
    }
  }

  unsubscribe(subscriberId: string, address: Bech32String): boolean {
    const existing = this.subscribers.get(address);
    if (!existing?.delete(subscriberId)) return false;
    if (existing.size === 0) this.subscribers.delete(address);
    return true;
  }

  async listSubscriptions(): Promise<readonly Subscription[]> {
    return Array.from(this.subscribers, ([address, ids]) =>
      Array.from(ids, (subscriberId) => ({ subscriberId, address }))
    ).flat();
  }
}
