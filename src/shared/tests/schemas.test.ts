import { ActionIn, BetIn, BustProbabilityQuery, NewGameIn, Rank } from '../schemas.js';

describe('request schemas', () => {
  test('bust probability query coerces strings', () => {
    expect(BustProbabilityQuery.parse({ total: '16' })).toEqual({ total: 16, role: 'player', soft: false });
    expect(BustProbabilityQuery.parse({ total: '17', role: 'dealer', soft: 'true' })).toEqual({
      total: 17,
      role: 'dealer',
      soft: true,
    });
  });

  test('bust probability query rejects junk', () => {
    expect(BustProbabilityQuery.safeParse({ total: 'abc' }).success).toBe(false);
    expect(BustProbabilityQuery.safeParse({ total: '40' }).success).toBe(false);
    expect(BustProbabilityQuery.safeParse({ total: '12', soft: 'yes' }).success).toBe(false);
  });

  test('actions', () => {
    expect(ActionIn.parse({ action: 'surrender' })).toEqual({ action: 'surrender' });
    expect(ActionIn.safeParse({ action: 'insure' }).success).toBe(false);
  });

  test('bets must be positive', () => {
    expect(BetIn.safeParse({ amount: 0 }).success).toBe(false);
    expect(BetIn.parse({ amount: 25 })).toEqual({ amount: 25 });
  });

  test('new game limits the deck count', () => {
    expect(NewGameIn.parse({})).toEqual({});
    expect(NewGameIn.safeParse({ decks: 9 }).success).toBe(false);
  });

  test('rank order starts with the ace', () => {
    expect(Rank.options[0]).toBe('A');
    expect(Rank.options).toHaveLength(13);
  });
});
