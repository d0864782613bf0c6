// Card and rank model - immutable values carrying play value and Hi-Lo tag
import { Rank, Suit, type TRank, type TSuit, type TCardOut } from '@shared/schemas';

export type { TRank, TSuit };

export const RANKS: readonly TRank[] = Rank.options;
export const SUITS: readonly TSuit[] = Suit.options;

export const SUIT_SYMBOLS: Record<TSuit, string> = {
  hearts: '♥',
  diamonds: '♦',
  clubs: '♣',
  spades: '♠',
};

// Blackjack play value; an Ace is 11 until the hand needs it to be 1
export const RANK_VALUES: Record<TRank, number> = {
  A: 11,
  '2': 2,
  '3': 3,
  '4': 4,
  '5': 5,
  '6': 6,
  '7': 7,
  '8': 8,
  '9': 9,
  '10': 10,
  J: 10,
  Q: 10,
  K: 10,
};

// Hi-Lo tags: low cards leaving the shoe help the player
export const HI_LO_TAGS: Record<TRank, number> = {
  A: -1,
  '2': 1,
  '3': 1,
  '4': 1,
  '5': 1,
  '6': 1,
  '7': 0,
  '8': 0,
  '9': 0,
  '10': -1,
  J: -1,
  Q: -1,
  K: -1,
};

export const TEN_VALUE_RANKS: readonly TRank[] = ['10', 'J', 'Q', 'K'];
export const LOW_RANKS: readonly TRank[] = ['2', '3', '4', '5', '6'];
export const HIGH_RANKS: readonly TRank[] = ['10', 'J', 'Q', 'K', 'A'];

export interface Card {
  readonly suit: TSuit;
  readonly rank: TRank;
}

export function makeCard(suit: TSuit, rank: TRank): Card {
  return Object.freeze({ suit, rank });
}

export function isAce(card: Card): boolean {
  return card.rank === 'A';
}

export function cardValue(card: Card): number {
  return RANK_VALUES[card.rank];
}

export function countValue(card: Card): number {
  return HI_LO_TAGS[card.rank];
}

// Ace counted as 1
export function softValue(card: Card): number {
  return isAce(card) ? 1 : RANK_VALUES[card.rank];
}

export function sameCard(a: Card, b: Card): boolean {
  return a.suit === b.suit && a.rank === b.rank;
}

export function cardLabel(card: Card): string {
  return `${card.rank}${SUIT_SYMBOLS[card.suit]}`;
}

export function toCardOut(card: Card): TCardOut {
  return { suit: card.suit, rank: card.rank, label: cardLabel(card) };
}

// Parses labels such as "A♠", "10h" or "Kd"; used by tests and stacked shoes
export function parseCard(label: string): Card {
  const match = /^(10|[2-9AJQK])([♥♦♣♠hdcs])$/i.exec(label.trim());
  if (!match) {
    throw new Error(`Invalid card label: ${label}`);
  }
  const rank = Rank.parse(match[1].toUpperCase());
  const suitChar = match[2].toLowerCase();
  const suit = SUITS.find(s => SUIT_SYMBOLS[s] === suitChar || s.startsWith(suitChar));
  if (!suit) {
    throw new Error(`Invalid suit in card label: ${label}`);
  }
  return makeCard(suit, rank);
}

export function parseCards(labels: string): Card[] {
  return labels.split(/\s+/).filter(Boolean).map(parseCard);
}

export type RankCounts = Record<TRank, number>;

export function emptyRankCounts(): RankCounts {
  return { A: 0, '2': 0, '3': 0, '4': 0, '5': 0, '6': 0, '7': 0, '8': 0, '9': 0, '10': 0, J: 0, Q: 0, K: 0 };
}

export function sumRankCounts(counts: RankCounts, ranks: readonly TRank[] = RANKS): number {
  return ranks.reduce((sum, rank) => sum + counts[rank], 0);
}
