// Blackjack table rules, the dealer's drawing rule and hand settlement
import type { THandOutcome } from '@shared/schemas';
import type { Hand } from './hand.js';

export interface TableRules {
  dealerHitsSoft17: boolean;
  doubleAfterSplit: boolean;
  surrenderAllowed: boolean;
  // Winnings per unit bet on a natural (1.5 = 3:2)
  blackjackPayout: number;
}

export const DEFAULT_RULES: TableRules = {
  dealerHitsSoft17: true,
  doubleAfterSplit: true,
  surrenderAllowed: true,
  blackjackPayout: 1.5,
};

export const BUST_TOTAL = 22;

// Dealer stands on 17+, except soft 17 under H17
export function dealerStandsOn(total: number, soft: boolean, dealerHitsSoft17: boolean): boolean {
  if (total > 17) return true;
  if (total < 17) return false;
  return !(soft && dealerHitsSoft17);
}

export function shouldDealerHit(dealer: Hand, rules: Pick<TableRules, 'dealerHitsSoft17'>): boolean {
  return !dealerStandsOn(dealer.total, dealer.isSoft, rules.dealerHitsSoft17);
}

export interface HandSettlement {
  outcome: THandOutcome;
  // Amount returned to the bankroll, stake included
  payout: number;
}

/**
 * Settles one player hand against the dealer's final hand.
 * `natural` is false for hands created by a split: their two-card 21 is a plain 21.
 */
export function settleHand(
  player: Hand,
  dealer: Hand,
  bet: number,
  rules: Pick<TableRules, 'blackjackPayout'>,
  natural: boolean = true
): HandSettlement {
  if (player.isSurrendered) {
    return { outcome: 'player-surrender', payout: bet * 0.5 };
  }

  if (player.isBust) {
    return { outcome: 'dealer-win', payout: 0 };
  }

  const playerBlackjack = natural && player.isBlackjack;
  if (playerBlackjack) {
    if (dealer.isBlackjack) {
      return { outcome: 'push', payout: bet };
    }
    return { outcome: 'player-blackjack', payout: bet * (1 + rules.blackjackPayout) };
  }

  if (dealer.isBlackjack) {
    return { outcome: 'dealer-blackjack', payout: 0 };
  }

  if (dealer.isBust || player.total > dealer.total) {
    return { outcome: 'player-win', payout: bet * 2 };
  }
  if (player.total < dealer.total) {
    return { outcome: 'dealer-win', payout: 0 };
  }
  return { outcome: 'push', payout: bet };
}
