import { loadConfig } from '../config.js';

describe('loadConfig', () => {
  test('defaults', () => {
    const config = loadConfig({});
    expect(config.port).toBe(3001);
    expect(config.corsOrigins).toEqual(['http://localhost:5173']);
    expect(config.logLevel).toBe('info');
    expect(config.decks).toBe(6);
    expect(config.minBet).toBe(10);
    expect(config.maxBet).toBe(1000);
    expect(config.startingBankroll).toBe(1000);
    expect(config.cutCard).toEqual({ min: 60, max: 75 });
    expect(config.shoeSeed).toBeUndefined();
    expect(config.rules).toEqual({
      dealerHitsSoft17: true,
      doubleAfterSplit: true,
      surrenderAllowed: true,
      blackjackPayout: 1.5,
    });
    expect(config.dealerRevealMs).toBe(1000);
  });

  test('quiet by default under test', () => {
    expect(loadConfig({ NODE_ENV: 'test' }).logLevel).toBe('warn');
    expect(loadConfig({ NODE_ENV: 'test', LOG_LEVEL: 'DEBUG' }).logLevel).toBe('debug');
  });

  test('reads overrides', () => {
    const config = loadConfig({
      PORT: '8080',
      CORS_ORIGINS: 'http://a.test, http://b.test',
      NUM_DECKS: '2',
      SHOE_SEED: '7',
      DEALER_HITS_SOFT_17: 'false',
      SURRENDER_ALLOWED: '0',
      BLACKJACK_PAYOUT: '1.2',
      CUT_CARD_MIN: '20',
      CUT_CARD_MAX: '30',
    });
    expect(config.port).toBe(8080);
    expect(config.corsOrigins).toEqual(['http://a.test', 'http://b.test']);
    expect(config.decks).toBe(2);
    expect(config.shoeSeed).toBe(7);
    expect(config.rules.dealerHitsSoft17).toBe(false);
    expect(config.rules.surrenderAllowed).toBe(false);
    expect(config.rules.blackjackPayout).toBe(1.2);
    expect(config.cutCard).toEqual({ min: 20, max: 30 });
  });

  test('rejects malformed values', () => {
    expect(() => loadConfig({ MIN_BET: 'ten' })).toThrow('Invalid number for MIN_BET: ten');
    expect(() => loadConfig({ DOUBLE_AFTER_SPLIT: 'maybe' })).toThrow('Invalid boolean for DOUBLE_AFTER_SPLIT: maybe');
    expect(() => loadConfig({ NUM_DECKS: '0' })).toThrow('Invalid integer for NUM_DECKS');
    expect(() => loadConfig({ LOG_LEVEL: 'loud' })).toThrow('Invalid LOG_LEVEL: loud');
  });

  test('rejects inconsistent ranges', () => {
    expect(() => loadConfig({ CUT_CARD_MIN: '80', CUT_CARD_MAX: '70' })).toThrow(
      'CUT_CARD_MIN (80) exceeds CUT_CARD_MAX (70)'
    );
    expect(() => loadConfig({ CUT_CARD_MIN: '0', CUT_CARD_MAX: '0' })).toThrow(
      'Invalid integer for CUT_CARD_MIN: 0 (minimum 20)'
    );
    expect(() => loadConfig({ CUT_CARD_MIN: '30', CUT_CARD_MAX: '10' })).toThrow(
      'Invalid integer for CUT_CARD_MAX: 10 (minimum 20)'
    );
    expect(() => loadConfig({ MIN_BET: '50', MAX_BET: '20' })).toThrow('Invalid bet limits: MIN_BET=50, MAX_BET=20');
  });
});
