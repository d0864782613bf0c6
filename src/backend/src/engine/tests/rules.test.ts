import { parseCards } from '../cards.js';
import { Hand } from '../hand.js';
import { DEFAULT_RULES, dealerStandsOn, settleHand, shouldDealerHit } from '../rules.js';

const hand = (labels: string) => new Hand(parseCards(labels));

describe('dealer drawing rule', () => {
  test('stands on 17 unless it is soft under H17', () => {
    expect(dealerStandsOn(16, false, true)).toBe(false);
    expect(dealerStandsOn(17, false, true)).toBe(true);
    expect(dealerStandsOn(17, true, true)).toBe(false);
    expect(dealerStandsOn(17, true, false)).toBe(true);
    expect(dealerStandsOn(18, true, true)).toBe(true);
  });

  test('reads the hand', () => {
    expect(shouldDealerHit(hand('Ah 6c'), { dealerHitsSoft17: true })).toBe(true);
    expect(shouldDealerHit(hand('Ah 6c'), { dealerHitsSoft17: false })).toBe(false);
    expect(shouldDealerHit(hand('10h 6c'), DEFAULT_RULES)).toBe(true);
  });
});

describe('settleHand', () => {
  const rules = DEFAULT_RULES;

  test('surrender returns half', () => {
    const player = hand('10h 6c');
    player.markSurrendered();
    expect(settleHand(player, hand('10d 9s'), 10, rules)).toEqual({ outcome: 'player-surrender', payout: 5 });
  });

  test('a busted player loses even if the dealer busts', () => {
    expect(settleHand(hand('10h 6c 9d'), hand('10d 6s 8c'), 10, rules)).toEqual({ outcome: 'dealer-win', payout: 0 });
  });

  test('blackjack pays 3:2', () => {
    expect(settleHand(hand('Ah Kc'), hand('10d Qs'), 10, rules)).toEqual({ outcome: 'player-blackjack', payout: 25 });
  });

  test('blackjack against blackjack pushes', () => {
    expect(settleHand(hand('Ah Kc'), hand('Ad Qs'), 10, rules)).toEqual({ outcome: 'push', payout: 10 });
  });

  test('dealer blackjack beats a three-card 21', () => {
    expect(settleHand(hand('7h 7c 7d'), hand('Ad Qs'), 10, rules)).toEqual({ outcome: 'dealer-blackjack', payout: 0 });
  });

  test('a split ace and ten is a plain 21', () => {
    expect(settleHand(hand('Ah Kc'), hand('10d Qs'), 10, rules, false)).toEqual({ outcome: 'player-win', payout: 20 });
  });

  test('totals decide the rest', () => {
    expect(settleHand(hand('10h 8c'), hand('10d 6s 8c'), 10, rules).outcome).toBe('player-win');
    expect(settleHand(hand('10h 8c'), hand('10d 8s'), 10, rules)).toEqual({ outcome: 'push', payout: 10 });
    expect(settleHand(hand('10h 7c'), hand('10d 8s'), 10, rules)).toEqual({ outcome: 'dealer-win', payout: 0 });
  });

  test('payout follows the configured natural rate', () => {
    expect(settleHand(hand('Ah Kc'), hand('10d 9s'), 10, { blackjackPayout: 1.2 }).payout).toBeCloseTo(22, 10);
  });
});
