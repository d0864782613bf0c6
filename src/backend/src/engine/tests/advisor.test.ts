import { RANKS, SUITS, makeCard, parseCard, parseCards } from '../cards.js';
import { CompositionTracker } from '../counter.js';
import { ActionUnavailableError } from '../errors.js';
import { Hand } from '../hand.js';
import { StrategyEngine, insuranceEvFor } from '../advisor.js';
import { Shoe } from '../shoe.js';

const TENS = '10h 10d 10c 10s Jh Jd Jc Js Qh Qd Qc Qs Kh Kd Kc Ks';

function engineOver(labels: string): StrategyEngine {
  const tracker = new CompositionTracker();
  tracker.reset(Shoe.stacked(parseCards(labels)));
  return new StrategyEngine(tracker);
}

const hand = (labels: string) => new Hand(parseCards(labels));

describe('StrategyEngine', () => {
  test('every action against a dealer who always busts', () => {
    const engine = engineOver(TENS);
    const recommendation = engine.recommend(hand('10h 2c'), parseCard('6d'));
    expect(recommendation).toEqual({
      optimalAction: 'stand',
      optimalEv: 1,
      basicAction: 'stand',
      basicEv: 1,
      evDifference: 0,
      countAdvantage: false,
      actionEvs: { hit: -1, stand: 1, double: -2, surrender: -0.5 },
    });
  });

  test('ties go to the earlier action', () => {
    const engine = engineOver(TENS);
    // Soft 16 cannot bust on a ten, so hit and stand both win outright
    const play = engine.optimalAction(hand('Ah 5c'), parseCard('6d'), { double: false });
    expect(play.action).toBe('hit');
    expect(play.ev).toBe(1);
    expect(play.actionEvs.stand).toBe(1);
  });

  test('doubling a sure win beats hitting it', () => {
    const engine = engineOver(TENS);
    const play = engine.optimalAction(hand('Ah 5c'), parseCard('6d'));
    expect(play).toEqual({ action: 'double', ev: 2, actionEvs: { hit: 1, stand: 1, double: 2, surrender: -0.5 } });
  });

  test('composition can beat basic strategy', () => {
    // Dealer 7 draws 5, 5 to a hard 17; the player's 16 hits to 21
    const engine = engineOver('5h 5d 5c 5s');
    const recommendation = engine.recommend(hand('10h 6c'), parseCard('7d'));
    expect(recommendation.optimalAction).toBe('double');
    expect(recommendation.optimalEv).toBe(2);
    expect(recommendation.basicAction).toBe('hit');
    expect(recommendation.basicEv).toBe(1);
    expect(recommendation.evDifference).toBe(1);
    expect(recommendation.countAdvantage).toBe(true);
  });

  test('surrender wins when everything else loses outright', () => {
    // Dealer 6 draws 4, 4, 4 to 18
    const engine = engineOver('4h 4d 4c 4s');
    const recommendation = engine.recommend(hand('10h 3c'), parseCard('6d'));
    expect(recommendation.actionEvs).toEqual({ hit: -1, stand: -1, double: -2, surrender: -0.5 });
    expect(recommendation.optimalAction).toBe('surrender');
    expect(recommendation.basicAction).toBe('stand');
    expect(recommendation.evDifference).toBe(0.5);
  });

  test('split evaluates each eight with one drawn card', () => {
    const engine = engineOver(TENS);
    const play = engine.optimalAction(hand('8h 8c'), parseCard('6d'));
    expect(play.actionEvs.split).toBe(2);
    expect(play.action).toBe('split');
  });

  test('table availability removes actions', () => {
    const engine = engineOver(TENS);
    const evs = engine.actionEvs(hand('8h 8c'), parseCard('6d'), { double: false, split: false, surrender: false });
    expect(Object.keys(evs)).toEqual(['hit', 'stand']);
  });

  test('basic strategy plays a pair by its total when the split is unaffordable', () => {
    const engine = engineOver(TENS);
    const recommendation = engine.recommend(hand('8h 8c'), parseCard('6d'), { split: false });
    expect(recommendation.basicAction).toBe('stand');
    expect(recommendation.basicEv).toBe(1);
    expect(recommendation.optimalAction).toBe('stand');
    expect(recommendation.evDifference).toBe(0);
    expect(recommendation.actionEvs.split).toBeUndefined();
  });

  test('three-card hands only hit or stand', () => {
    const engine = engineOver(TENS);
    expect(Object.keys(engine.actionEvs(hand('2h 3c 4d'), parseCard('6d')))).toEqual(['hit', 'stand']);
  });

  test('unavailable actions throw', () => {
    const engine = engineOver(TENS);
    const up = parseCard('6d');
    expect(() => engine.doubleEv(hand('2h 3c 4d'), up)).toThrow(ActionUnavailableError);
    expect(() => engine.splitEv(hand('9h 8c'), up)).toThrow("Action 'split' is not available: hand is not a pair");
    expect(() => engine.surrenderEv(hand('2h 3c 4d'))).toThrow(ActionUnavailableError);
  });

  test('busted and natural hands short-circuit', () => {
    const engine = engineOver(TENS);
    const up = parseCard('6d');
    expect(engine.optimalAction(hand('10h 6c 9d'), up)).toEqual({ action: 'stand', ev: -1, actionEvs: {} });
    expect(engine.optimalAction(hand('Ah Kc'), up)).toEqual({ action: 'stand', ev: 1.5, actionEvs: {} });
    expect(engine.standEv(hand('10h 6c 9d'), up)).toBe(-1);
  });

  test('the up-card is not removed from the composition again', () => {
    const engine = engineOver('Kh 7h');
    const dist = engine.dealerOutcomeDistribution(parseCard('Kd'));
    expect(dist.get(20)).toBe(0.5);
    expect(dist.get(17)).toBe(0.5);
  });

  test('stand EV never falls as the player total rises', () => {
    const tracker = new CompositionTracker();
    tracker.reset(Shoe.stacked(SUITS.flatMap(suit => RANKS.map(rank => makeCard(suit, rank)))));
    const engine = new StrategyEngine(tracker);
    const up = parseCard('10d');
    const dist = engine.dealerOutcomeDistribution(up);
    const evs = ['10h 6c', '10h 7c', '10h 8c', '10h 9c', '10h 5c 5d', '10h 5c 6d'].map(labels =>
      engine.standEv(hand(labels), up, dist)
    );
    for (let i = 1; i < evs.length; i++) {
      expect(evs[i]).toBeGreaterThanOrEqual(evs[i - 1] - 1e-12);
    }
  });
});

describe('insurance', () => {
  test('break-even at one ten in three', () => {
    const engine = engineOver('10h Jd Qc Ks 2h 3h 4h 5h 6h 7h 8h 9h');
    const recommendation = engine.insuranceRecommendation();
    expect(recommendation.dealerBlackjackProbability).toBeCloseTo(1 / 3, 12);
    expect(recommendation.insuranceEv).toBeCloseTo(0, 12);
    expect(recommendation.shouldTakeInsurance).toBe(false);
  });

  test('worth taking when tens are rich', () => {
    const engine = engineOver('10h Jd Qc Ks 2h 3h 4h 5h 6h 7h');
    const recommendation = engine.insuranceRecommendation();
    expect(recommendation.dealerBlackjackProbability).toBe(0.4);
    expect(recommendation.insuranceEv).toBeCloseTo(0.2, 12);
    expect(recommendation.basicEv).toBe(0);
    expect(recommendation.shouldTakeInsurance).toBe(true);
    expect(recommendation.countAdvantage).toBe(true);
  });

  test('no tens left', () => {
    expect(insuranceEvFor(0)).toBe(-1);
  });
});

describe('bust probability', () => {
  test('player draws one card', () => {
    const engine = engineOver(TENS);
    expect(engine.bustProbability(12)).toBe(1);
    expect(engine.bustProbability(11)).toBe(0);
    expect(engine.bustProbability(22)).toBe(1);
  });

  test('aces count as one when eleven would bust', () => {
    expect(engineOver('Ah Ad').bustProbability(12, 'player')).toBe(0);
  });

  test('mixed composition', () => {
    expect(engineOver('10h Kd 5c 5s').nextCardBustProbability(13)).toBe(0.5);
  });

  test('dealer role draws to the standing rule', () => {
    expect(engineOver(TENS).bustProbability(16, 'dealer')).toBe(1);
    expect(engineOver('5h 5d 5c 5s').bustProbability(12, 'dealer')).toBe(0);
    expect(engineOver(TENS).dealerBustProbability(parseCard('6d'))).toBe(1);
  });

  test('empty composition answers zero', () => {
    const tracker = new CompositionTracker();
    const shoe = Shoe.stacked(parseCards('2h'));
    tracker.reset(shoe);
    const card = shoe.deal();
    if (card) tracker.observe(card);
    expect(new StrategyEngine(tracker).nextCardBustProbability(20)).toBe(0);
  });
});
