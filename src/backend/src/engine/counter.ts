/**
 * Composition Tracker - Hi-Lo counting over the exact remaining composition
 *
 * Mirrors the shoe's per-rank counts from a snapshot taken at the last
 * shuffle plus every card observed since. The orchestrator must call
 * observe() exactly once per card that leaves the shoe, burns included.
 */

import type { TCountSnapshot, TCountStatus } from '@shared/schemas';
import {
  type Card,
  type RankCounts,
  type TRank,
  HIGH_RANKS,
  LOW_RANKS,
  RANKS,
  TEN_VALUE_RANKS,
  countValue,
  emptyRankCounts,
  sumRankCounts,
} from './cards.js';
import { InvariantViolationError } from './errors.js';
import { CARDS_PER_DECK, type CompositionSource } from './shoe.js';

export function countStatusFor(trueCount: number): TCountStatus {
  if (trueCount >= 2) return 'Very Favorable';
  if (trueCount >= 1) return 'Favorable';
  if (trueCount >= 0) return 'Neutral';
  if (trueCount >= -1) return 'Unfavorable';
  return 'Very Unfavorable';
}

// Bet spread policy: flat at or below zero, then 0.5 per unit up to TC 2, then 0.25
export function bettingMultiplierFor(trueCount: number): number {
  if (trueCount <= 0) return 1.0;
  if (trueCount <= 2) return 1.0 + trueCount * 0.5;
  return 2.0 + (trueCount - 2) * 0.25;
}

export class CompositionTracker {
  private counts: RankCounts = emptyRankCounts();
  private running = 0;
  private trueCountValue = 0;
  private seen = 0;
  private initialSize = 0;

  reset(source: CompositionSource): void {
    this.counts = source.remainingByRank();
    this.running = 0;
    this.trueCountValue = 0;
    this.seen = 0;
    this.initialSize = source.cardsRemaining;
  }

  observe(card: Card): void {
    if (this.counts[card.rank] <= 0) {
      throw new InvariantViolationError(
        `Observed ${card.rank} but the tracked composition has none left (double observe or foreign card)`
      );
    }
    this.counts[card.rank]--;
    this.running += countValue(card);
    this.seen++;

    const decks = this.decksRemaining;
    this.trueCountValue = decks > 0 ? this.running / decks : 0;
  }

  /** Throws when the tracked composition drifted from the physical shoe. */
  assertMatches(source: CompositionSource): void {
    if (source.cardsRemaining !== this.cardsRemaining) {
      throw new InvariantViolationError(
        `Tracker expects ${this.cardsRemaining} cards remaining but the shoe holds ${source.cardsRemaining}`
      );
    }
    const physical = source.remainingByRank();
    const drifted = RANKS.filter(rank => physical[rank] !== this.counts[rank]);
    if (drifted.length > 0) {
      const detail = drifted.map(rank => `${rank}: tracked ${this.counts[rank]}, shoe ${physical[rank]}`).join('; ');
      throw new InvariantViolationError(`Tracker and shoe disagree (${detail})`);
    }
  }

  get runningCount(): number {
    return this.running;
  }

  get trueCount(): number {
    return this.trueCountValue;
  }

  get cardsSeen(): number {
    return this.seen;
  }

  get cardsRemaining(): number {
    return this.initialSize - this.seen;
  }

  get decksRemaining(): number {
    if (this.initialSize === 0) return 0;
    return this.cardsRemaining / CARDS_PER_DECK;
  }

  get penetration(): number {
    if (this.initialSize === 0) return 0;
    return this.seen / this.initialSize;
  }

  count(rank: TRank): number {
    return this.counts[rank];
  }

  remainingCounts(): RankCounts {
    return { ...this.counts };
  }

  probability(rank: TRank): number {
    return this.groupProbability([rank]);
  }

  probabilityTenValue(): number {
    return this.groupProbability(TEN_VALUE_RANKS);
  }

  probabilityAce(): number {
    return this.probability('A');
  }

  probabilityLow(): number {
    return this.groupProbability(LOW_RANKS);
  }

  probabilityHigh(): number {
    return this.groupProbability(HIGH_RANKS);
  }

  countStatus(): TCountStatus {
    return countStatusFor(this.trueCountValue);
  }

  bettingMultiplier(): number {
    return bettingMultiplierFor(this.trueCountValue);
  }

  /** Presentation view. `unseen` cards (a face-down hole card) count as still in the shoe. */
  snapshot(unseen: readonly Card[] = []): TCountSnapshot {
    const remaining = this.remainingCounts();
    let running = this.running;
    for (const card of unseen) {
      remaining[card.rank]++;
      running -= countValue(card);
    }
    const seen = this.seen - unseen.length;
    const cardsRemaining = this.initialSize - seen;
    const decksRemaining = this.initialSize === 0 ? 0 : cardsRemaining / CARDS_PER_DECK;
    const trueCount = decksRemaining > 0 ? running / decksRemaining : 0;

    return {
      runningCount: running,
      trueCount,
      cardsSeen: seen,
      cardsRemaining,
      decksRemaining,
      penetration: this.initialSize === 0 ? 0 : seen / this.initialSize,
      status: countStatusFor(trueCount),
      bettingMultiplier: bettingMultiplierFor(trueCount),
      remaining,
    };
  }

  private groupProbability(ranks: readonly TRank[]): number {
    const remaining = this.cardsRemaining;
    if (remaining <= 0) return 0;
    return sumRankCounts(this.counts, ranks) / remaining;
  }
}
