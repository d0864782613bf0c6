// Shoe management - seeded shuffle, deal, burn, cut card and penetration
import {
  type Card,
  type RankCounts,
  type TRank,
  type TSuit,
  LOW_RANKS,
  HIGH_RANKS,
  RANKS,
  SUITS,
  TEN_VALUE_RANKS,
  emptyRankCounts,
  makeCard,
  sumRankCounts,
} from './cards.js';
import { type Rng, mulberry32, randomInt, shuffleInPlace } from './random.js';

export const CARDS_PER_DECK = 52;

export interface CutCardRange {
  min: number;
  max: number;
}

export const DEFAULT_CUT_CARD: CutCardRange = { min: 60, max: 75 };

// Configured cut cards leave at least a full round with a split or two in front of them
export const MIN_CUT_CARD = 20;

export interface ShoeOptions {
  decks?: number;
  seed?: number;
  cutCard?: CutCardRange;
  // Deal exactly these cards in this order instead of shuffled decks
  cards?: readonly Card[];
}

// What the composition tracker snapshots on reset
export interface CompositionSource {
  readonly cardsRemaining: number;
  remainingByRank(): RankCounts;
}

export class Shoe implements CompositionSource {
  readonly decks: number;
  private readonly rng: Rng;
  private readonly cutCardRange: CutCardRange;
  private readonly stacked: Card[] | null;
  private cards: Card[] = [];
  private dealt = 0;
  private counts: RankCounts = emptyRankCounts();
  private cutCard = 0;
  private shuffles = 0;

  constructor(options: ShoeOptions = {}) {
    this.stacked = options.cards ? [...options.cards] : null;
    this.decks = this.stacked
      ? Math.max(1, Math.ceil(this.stacked.length / CARDS_PER_DECK))
      : Math.max(1, Math.floor(options.decks ?? 6));
    this.rng = mulberry32(options.seed ?? Date.now());
    this.cutCardRange = options.cutCard ?? (this.stacked ? { min: 0, max: 0 } : DEFAULT_CUT_CARD);
    this.shuffle();
  }

  /**
   * A shoe that deals the given cards in order, first card first. Shuffling a
   * stacked shoe restores the same order, which keeps replays deterministic.
   */
  static stacked(cards: readonly Card[], options: Omit<ShoeOptions, 'cards' | 'decks'> = {}): Shoe {
    return new Shoe({ ...options, cards });
  }

  /** Rebuilds every deck, shuffles, and freezes a new cut-card position. */
  shuffle(): void {
    this.cards = this.stacked ? [...this.stacked] : shuffleInPlace(this.buildDecks(), this.rng);
    this.dealt = 0;
    this.counts = emptyRankCounts();
    for (const card of this.cards) {
      this.counts[card.rank]++;
    }
    this.cutCard = randomInt(this.rng, this.cutCardRange.min, this.cutCardRange.max);
    this.shuffles++;
  }

  deal(): Card | null {
    if (this.dealt >= this.cards.length) {
      return null; // Shoe exhausted
    }
    const card = this.cards[this.dealt];
    this.dealt++;
    this.counts[card.rank]--;
    return card;
  }

  // Same removal as deal; the card is never shown to a hand
  burn(): Card | null {
    return this.deal();
  }

  /** Cards left in front of the cut card when the shoe is due a shuffle. */
  cutCardPosition(): number {
    return this.cutCard;
  }

  shouldShuffle(): boolean {
    return this.cardsRemaining <= this.cutCard;
  }

  get shuffleCount(): number {
    return this.shuffles;
  }

  get size(): number {
    return this.cards.length;
  }

  get cardsRemaining(): number {
    return this.cards.length - this.dealt;
  }

  get decksRemaining(): number {
    return this.cardsRemaining / CARDS_PER_DECK;
  }

  get penetration(): number {
    if (this.cards.length === 0) return 0;
    return this.dealt / this.cards.length;
  }

  count(rank: TRank): number {
    return this.counts[rank];
  }

  suitCount(suit: TSuit): number {
    return this.cards.slice(this.dealt).filter(card => card.suit === suit).length;
  }

  remainingByRank(): RankCounts {
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

  private groupProbability(ranks: readonly TRank[]): number {
    if (this.cardsRemaining === 0) return 0;
    return sumRankCounts(this.counts, ranks) / this.cardsRemaining;
  }

  private buildDecks(): Card[] {
    const cards: Card[] = [];
    for (let deck = 0; deck < this.decks; deck++) {
      for (const suit of SUITS) {
        for (const rank of RANKS) {
          cards.push(makeCard(suit, rank));
        }
      }
    }
    return cards;
  }
}
