import words from './words.json';
import { Tag, TagService } from '../models/Tag';

const DAY_MS = 24 * 60 * 60 * 1000;

export interface FixtureOptions {
  count?: number;
  random?: () => number;
  now?: () => Date;
}

/**
 * Demo tags: random single-word titles, created and updated at independent
 * random moments between 100 days and 1 day ago.
 */
export class TagFixtures {
  private readonly count: number;
  private readonly random: () => number;
  private readonly now: () => Date;

  constructor(options: FixtureOptions = {}) {
    this.count = options.count ?? 100;
    this.random = options.random ?? Math.random;
    this.now = options.now ?? (() => new Date());
  }

  private word(): string {
    return words[Math.floor(this.random() * words.length)];
  }

  private dateBetween(daysAgoFrom: number, daysAgoTo: number): Date {
    const now = this.now().getTime();
    const start = now - daysAgoFrom * DAY_MS;
    const end = now - daysAgoTo * DAY_MS;
    return new Date(start + Math.floor(this.random() * (end - start)));
  }

  build(): Tag[] {
    const tags: Tag[] = [];
    for (let i = 0; i < this.count; i++) {
      tags.push({
        title: this.word(),
        createdAt: this.dateBetween(100, 1),
        updatedAt: this.dateBetween(100, 1)
      });
    }
    return tags;
  }

  /**
   * Build the tags and insert them in one batch
   */
  async load(): Promise<number> {
    const inserted = await TagService.saveAll(this.build());
    console.log(`🏷️ Loaded ${inserted} tag fixtures`);
    return inserted;
  }
}
