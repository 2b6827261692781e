/**
 * Position tracker: a per-tick view over the venue's open positions,
 * partitioned by ownership tag. Nothing is cached between refreshes.
 */

import type { Position } from "./types";
import type { Venue } from "./venue";

export class PositionBook {
  readonly positions: readonly Position[];

  constructor(positions: readonly Position[]) {
    this.positions = positions;
  }

  get size(): number {
    return this.positions.length;
  }

  owned(tag: string): Position[] {
    return this.positions.filter((p) => p.ownerTag === tag);
  }

  count(tag: string): number {
    return this.owned(tag).length;
  }

  byOwner(): Map<string, Position[]> {
    const map = new Map<string, Position[]>();
    for (const p of this.positions) {
      const list = map.get(p.ownerTag);
      if (list) list.push(p);
      else map.set(p.ownerTag, [p]);
    }
    return map;
  }

  /** Counts for each tag, zero-filled. */
  counts(tags: string[]): Record<string, number> {
    const out: Record<string, number> = {};
    for (const tag of tags) out[tag] = this.count(tag);
    return out;
  }

  /** Positions whose tag matches none of `tags` (opened manually or by another process). */
  unowned(tags: string[]): Position[] {
    const known = new Set(tags);
    return this.positions.filter((p) => !known.has(p.ownerTag));
  }

  without(tickets: Iterable<string>): PositionBook {
    const drop = new Set(tickets);
    return new PositionBook(this.positions.filter((p) => !drop.has(p.ticket)));
  }

  toArray(): Position[] {
    return [...this.positions];
  }
}

export class PositionTracker {
  private readonly venue: Venue;

  constructor(venue: Venue) {
    this.venue = venue;
  }

  async refresh(symbol?: string): Promise<PositionBook> {
    return new PositionBook(await this.venue.getOpenPositions(symbol));
  }
}
