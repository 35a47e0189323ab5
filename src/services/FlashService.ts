export type FlashType = 'success' | 'warning' | 'error';

export interface Flash {
  type: FlashType;
  message: string;
}

interface FlashBag {
  flashes: Flash[];
  expiresAt: number;
}

export const FLASH_TTL_MS = 10 * 60 * 1000;
export const MAX_FLASH_BAGS = 10_000;

/**
 * One-time notices kept per session until the next rendered response reads them.
 * Process memory only: notices do not survive a restart. Unread bags expire after
 * FLASH_TTL_MS and the store never holds more than MAX_FLASH_BAGS.
 */
export class FlashService {
  private static bags = new Map<string, FlashBag>();

  static add(sessionId: string, type: FlashType, message: string): void {
    const now = Date.now();
    this.sweep(now);

    const flashes = this.bags.get(sessionId)?.flashes ?? [];
    flashes.push({ type, message });

    // Re-insert so the Map's order stays oldest write first
    this.bags.delete(sessionId);
    this.bags.set(sessionId, { flashes, expiresAt: now + FLASH_TTL_MS });

    for (const oldest of this.bags.keys()) {
      if (this.bags.size <= MAX_FLASH_BAGS) {
        break;
      }
      this.bags.delete(oldest);
    }
  }

  static consume(sessionId: string): Flash[] {
    const bag = this.bags.get(sessionId);
    this.bags.delete(sessionId);

    if (!bag || bag.expiresAt <= Date.now()) {
      return [];
    }
    return bag.flashes;
  }

  static size(): number {
    return this.bags.size;
  }

  static clear(): void {
    this.bags.clear();
  }

  private static sweep(now: number): void {
    for (const [sessionId, bag] of this.bags) {
      // Insertion order is expiry order
      if (bag.expiresAt > now) {
        break;
      }
      this.bags.delete(sessionId);
    }
  }
}
