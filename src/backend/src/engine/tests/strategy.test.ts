import { parseCard, parseCards } from '../cards.js';
import { Hand } from '../hand.js';
import { getBasicStrategyAction } from '../strategy.js';

const basic = (player: string, up: string) => getBasicStrategyAction(new Hand(parseCards(player)), parseCard(up));

describe('basic strategy', () => {
  test.each([
    ['8h 8d', 'Kc', 'split'],
    ['Ah Ad', 'As', 'split'],
    ['Kh Kd', '6c', 'split'],
    ['Kh Kd', '7c', 'stand'],
    ['Kh Qd', '6c', 'stand'],
    ['9h 9d', '7c', 'stand'],
    ['9h 9d', '8c', 'split'],
    ['5h 5d', '9c', 'split'],
    ['4h 4d', '5c', 'split'],
    ['4h 4d', '4c', 'hit'],
  ])('pair %s against %s: %s', (player, up, action) => {
    expect(basic(player, up)).toBe(action);
  });

  test('pairs fall back to their totals when splitting is off', () => {
    const noSplit = (player: string, up: string) =>
      getBasicStrategyAction(new Hand(parseCards(player)), parseCard(up), false);
    expect(noSplit('8h 8d', 'Kc')).toBe('hit');
    expect(noSplit('8h 8d', '6c')).toBe('stand');
    expect(noSplit('Ah Ad', '6c')).toBe('hit');
  });

  test.each([
    ['Ah 7d', '9c', 'hit'],
    ['Ah 7d', '8c', 'stand'],
    ['Ah 8d', 'Kc', 'stand'],
    ['Ah 5d', '6c', 'hit'],
  ])('soft %s against %s: %s', (player, up, action) => {
    expect(basic(player, up)).toBe(action);
  });

  test.each([
    ['10h 6d', '7c', 'hit'],
    ['10h 6d', '6c', 'stand'],
    ['10h 6d', 'Ac', 'hit'],
    ['10h 5d', '10c', 'hit'],
    ['10h 5d', '9c', 'stand'],
    ['10h 3d', '6c', 'stand'],
    ['10h 3d', '7c', 'hit'],
    ['10h 2d', '3c', 'hit'],
    ['10h 2d', '4c', 'stand'],
    ['10h 7d', 'Ac', 'stand'],
    ['5h 6d', '6c', 'hit'],
  ])('hard %s against %s: %s', (player, up, action) => {
    expect(basic(player, up)).toBe(action);
  });
});
