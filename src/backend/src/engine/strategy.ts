import type { TAction } from '@shared/schemas';
import { type Card, type TRank, RANK_VALUES, TEN_VALUE_RANKS } from './cards.js';
import type { Hand } from './hand.js';

// Count-independent baseline used only to measure what the composition is worth

// Dealer up-card values (Ace = 11) against which each pair rank splits
const SPLIT_AGAINST: Partial<Record<TRank, readonly number[]>> = {
  '9': [2, 3, 4, 5, 6, 8, 9],
  '7': [2, 3, 4, 5, 6, 7],
  '6': [2, 3, 4, 5, 6],
  '5': [2, 3, 4, 5, 6, 7, 8, 9],
  '4': [5, 6],
  '3': [2, 3, 4, 5, 6, 7],
  '2': [2, 3, 4, 5, 6, 7],
};

const TEN_PAIR_SPLIT_AGAINST: readonly number[] = [5, 6];

// With splitAllowed false a pair is played by its total
export function getBasicStrategyAction(hand: Hand, dealerUpcard: Card, splitAllowed: boolean = true): TAction {
  const playerValue = hand.total;
  const dealerValue = RANK_VALUES[dealerUpcard.rank];

  if (splitAllowed && hand.canSplit && shouldSplit(hand.cards[0].rank, dealerValue)) {
    return 'split';
  }

  if (hand.isSoft) {
    return getSoftHandStrategy(playerValue, dealerValue);
  }

  return getHardHandStrategy(playerValue, dealerValue);
}

function shouldSplit(pairRank: TRank, dealerValue: number): boolean {
  // Always split Aces and eights
  if (pairRank === 'A' || pairRank === '8') return true;

  if (TEN_VALUE_RANKS.includes(pairRank)) {
    return TEN_PAIR_SPLIT_AGAINST.includes(dealerValue);
  }

  return SPLIT_AGAINST[pairRank]?.includes(dealerValue) ?? false;
}

function getSoftHandStrategy(playerValue: number, dealerValue: number): TAction {
  if (playerValue >= 19) return 'stand';

  // Soft 18 hits against 9, 10 and Ace
  if (playerValue === 18) {
    return dealerValue >= 9 ? 'hit' : 'stand';
  }

  return 'hit';
}

function getHardHandStrategy(playerValue: number, dealerValue: number): TAction {
  if (playerValue >= 17) return 'stand';

  if (playerValue === 16) {
    return dealerValue >= 7 ? 'hit' : 'stand';
  }

  if (playerValue === 15) {
    return dealerValue >= 10 ? 'hit' : 'stand';
  }

  if (playerValue === 13 || playerValue === 14) {
    return dealerValue <= 6 ? 'stand' : 'hit';
  }

  if (playerValue === 12) {
    return (dealerValue >= 4 && dealerValue <= 6) ? 'stand' : 'hit';
  }

  return 'hit';
}
