import { Inject, Injectable } from '@nestjs/common';
import { CLOCK, Clock } from '../common/utility/clock';
import { CacheStore } from './cache-store.interface';

interface Entry {
  value: string;
  expiresAt: number;
}

@Injectable()
export class InMemoryCacheStore implements CacheStore {
  private readonly entries = new Map<string, Entry>();

  constructor(@Inject(CLOCK) private readonly clock: Clock) {}

  async get(key: string): Promise<string | null> {
    const entry = this.entries.get(key);
    if (!entry) {
      return null;
    }
    if (this.clock.now().getTime() >= entry.expiresAt) {
      this.entries.delete(key);
      return null;
    }
    return entry.value;
  }

  async set(key: string, value: string, ttlSeconds: number): Promise<void> {
    this.entries.set(key, {
      value,
      expiresAt: this.clock.now().getTime() + ttlSeconds * 1000,
    });
  }

  async delete(key: string): Promise<void> {
    this.entries.delete(key);
  }
}
