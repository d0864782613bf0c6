/**
 * Strategy/Probability Engine - composition-dependent EV for every player action
 *
 * Reads the composition tracker (never writes it). The dealer distribution is
 * rebuilt per call and shared by every action evaluated within that call.
 *
 * Documented simplifications, kept on purpose so results stay comparable:
 * - hit draws one card and then stands (no multi-card lookahead)
 * - split is twice the EV of one split card plus one drawn card, stood
 * - drawn-card probabilities come from the current composition and are not
 *   conditioned on the dealer's hole card
 */

import { Action, type TAction, type TActionEvs, type TInsuranceRecommendation, type TRecommendation } from '@shared/schemas';
import { type Card, RANKS, RANK_VALUES, isAce, makeCard } from './cards.js';
import type { CompositionTracker } from './counter.js';
import { type DealerDistribution, bustProbabilityOf, dealerDistributionFrom } from './dealer.js';
import { ActionUnavailableError } from './errors.js';
import { Hand } from './hand.js';
import { DEFAULT_RULES, type TableRules } from './rules.js';
import { getBasicStrategyAction } from './strategy.js';
import { recommendationDuration, withSpan } from '../telemetry.js';
import { logger } from '../utils/logger.js';

export const ACTION_ORDER: readonly TAction[] = Action.options;
export const SURRENDER_EV = -0.5;
export const NATURAL_EV = 1.5;

export type PlayerRole = 'player' | 'dealer';

// Table-level permissions the hand itself cannot know about
export interface ActionAvailability {
  double?: boolean;
  split?: boolean;
  surrender?: boolean;
}

export interface OptimalPlay {
  action: TAction;
  ev: number;
  actionEvs: TActionEvs;
}

// Insurance pays 2:1: win 2 with probability p, lose 1 otherwise
export function insuranceEvFor(tenValueProbability: number): number {
  return 3 * tenValueProbability - 1;
}

export class StrategyEngine {
  constructor(
    private readonly tracker: CompositionTracker,
    private readonly rules: Pick<TableRules, 'dealerHitsSoft17'> = DEFAULT_RULES
  ) {}

  dealerOutcomeDistribution(dealerUpcard: Card): DealerDistribution {
    return dealerDistributionFrom(
      RANK_VALUES[dealerUpcard.rank],
      isAce(dealerUpcard),
      this.tracker.remainingCounts(),
      this.rules.dealerHitsSoft17
    );
  }

  standEv(hand: Hand, dealerUpcard: Card, dist: DealerDistribution = this.dealerOutcomeDistribution(dealerUpcard)): number {
    if (hand.isBust) return -1.0;

    const playerTotal = hand.total;
    let ev = 0;
    for (const [dealerTotal, probability] of dist) {
      if (dealerTotal > 21 || dealerTotal < playerTotal) {
        ev += probability;
      } else if (dealerTotal > playerTotal) {
        ev -= probability;
      }
    }
    return ev;
  }

  hitEv(hand: Hand, dealerUpcard: Card, dist: DealerDistribution = this.dealerOutcomeDistribution(dealerUpcard)): number {
    return this.drawOneThenStandEv(hand, dealerUpcard, dist, 1);
  }

  doubleEv(hand: Hand, dealerUpcard: Card, dist: DealerDistribution = this.dealerOutcomeDistribution(dealerUpcard)): number {
    if (!hand.canDouble) {
      throw new ActionUnavailableError('double', `hand has ${hand.size} cards, doubling needs exactly 2`);
    }
    return this.drawOneThenStandEv(hand, dealerUpcard, dist, 2);
  }

  splitEv(hand: Hand, dealerUpcard: Card, dist: DealerDistribution = this.dealerOutcomeDistribution(dealerUpcard)): number {
    if (!hand.canSplit) {
      throw new ActionUnavailableError('split', 'hand is not a pair');
    }
    const half = new Hand([hand.cards[0]]);
    return 2 * this.drawOneThenStandEv(half, dealerUpcard, dist, 1);
  }

  surrenderEv(hand: Hand): number {
    if (hand.size !== 2) {
      throw new ActionUnavailableError('surrender', `hand has ${hand.size} cards, surrender needs exactly 2`);
    }
    return SURRENDER_EV;
  }

  /** EV of every action the hand (and the table) allows, in tie-break order. */
  actionEvs(
    hand: Hand,
    dealerUpcard: Card,
    availability: ActionAvailability = {},
    dist: DealerDistribution = this.dealerOutcomeDistribution(dealerUpcard)
  ): TActionEvs {
    const evs: TActionEvs = {
      hit: this.hitEv(hand, dealerUpcard, dist),
      stand: this.standEv(hand, dealerUpcard, dist),
    };
    if (hand.canDouble && availability.double !== false) {
      evs.double = this.doubleEv(hand, dealerUpcard, dist);
    }
    if (hand.canSplit && availability.split !== false) {
      evs.split = this.splitEv(hand, dealerUpcard, dist);
    }
    if (hand.size === 2 && availability.surrender !== false) {
      evs.surrender = this.surrenderEv(hand);
    }
    return evs;
  }

  optimalAction(
    hand: Hand,
    dealerUpcard: Card,
    availability: ActionAvailability = {},
    dist?: DealerDistribution
  ): OptimalPlay {
    if (hand.isBust) {
      return { action: 'stand', ev: -1.0, actionEvs: {} };
    }
    if (hand.isBlackjack) {
      return { action: 'stand', ev: NATURAL_EV, actionEvs: {} };
    }

    const actionEvs = this.actionEvs(hand, dealerUpcard, availability, dist ?? this.dealerOutcomeDistribution(dealerUpcard));
    let best: { action: TAction; ev: number } | null = null;
    for (const action of ACTION_ORDER) {
      const ev = actionEvs[action];
      // Strict comparison: on a tie the earlier action wins
      if (ev !== undefined && (best === null || ev > best.ev)) {
        best = { action, ev };
      }
    }
    if (!best) {
      throw new Error('No action evaluated');
    }
    return { ...best, actionEvs };
  }

  basicAction(hand: Hand, dealerUpcard: Card, availability: ActionAvailability = {}): TAction {
    return getBasicStrategyAction(hand, dealerUpcard, availability.split !== false);
  }

  recommend(hand: Hand, dealerUpcard: Card, availability: ActionAvailability = {}): TRecommendation {
    return withSpan('advisor.recommend', span => {
      const startedAt = performance.now();
      const dist = this.dealerOutcomeDistribution(dealerUpcard);

      const optimal = this.optimalAction(hand, dealerUpcard, availability, dist);
      const basicAction = this.basicAction(hand, dealerUpcard, availability);
      const basicEv = this.evOf(basicAction, hand, dealerUpcard, dist);

      const elapsed = performance.now() - startedAt;
      recommendationDuration.record(elapsed, { action: optimal.action });
      span.setAttributes({
        'blackjack.player_total': hand.total,
        'blackjack.dealer_upcard': dealerUpcard.rank,
        'blackjack.optimal_action': optimal.action,
      });
      logger.debug(
        `[Advisor] ${hand.total}${hand.isSoft ? ' (soft)' : ''} vs ${dealerUpcard.rank}: ` +
        `optimal ${optimal.action} (EV: ${optimal.ev.toFixed(3)}), basic ${basicAction} (EV: ${basicEv.toFixed(3)}) ` +
        `in ${elapsed.toFixed(1)}ms`
      );

      return {
        optimalAction: optimal.action,
        optimalEv: optimal.ev,
        basicAction,
        basicEv,
        evDifference: optimal.ev - basicEv,
        countAdvantage: optimal.ev > basicEv,
        actionEvs: optimal.actionEvs,
      };
    });
  }

  insuranceRecommendation(): TInsuranceRecommendation {
    const dealerBlackjackProbability = this.tracker.probabilityTenValue();
    const insuranceEv = insuranceEvFor(dealerBlackjackProbability);
    const basicEv = 0.0; // declining insurance risks nothing

    return {
      shouldTakeInsurance: insuranceEv > 0,
      insuranceEv,
      basicEv,
      dealerBlackjackProbability,
      countAdvantage: insuranceEv > basicEv,
    };
  }

  /**
   * Player: chance the very next card busts `total` (one draw, hard total).
   * Dealer: bust mass of the dealer distribution from `total`, drawing to the
   * table's standing rule - the same computation the EVs use.
   */
  bustProbability(total: number, role: PlayerRole = 'player', soft: boolean = false): number {
    if (total > 21) return 1.0;
    if (role === 'player') {
      return this.nextCardBustProbability(total);
    }
    return bustProbabilityOf(
      dealerDistributionFrom(total, soft, this.tracker.remainingCounts(), this.rules.dealerHitsSoft17)
    );
  }

  dealerBustProbability(dealerUpcard: Card): number {
    return bustProbabilityOf(this.dealerOutcomeDistribution(dealerUpcard));
  }

  // Simplified single-draw helper; the dealer distribution stays the source of truth
  nextCardBustProbability(total: number): number {
    if (total > 21) return 1.0;
    let bust = 0;
    for (const rank of RANKS) {
      const probability = this.tracker.probability(rank);
      if (probability <= 0) continue;
      const value = rank === 'A' ? (total + 11 > 21 ? 1 : 11) : RANK_VALUES[rank];
      if (total + value > 21) {
        bust += probability;
      }
    }
    return bust;
  }

  private evOf(action: TAction, hand: Hand, dealerUpcard: Card, dist: DealerDistribution): number {
    switch (action) {
      case 'hit':
        return this.hitEv(hand, dealerUpcard, dist);
      case 'stand':
        return this.standEv(hand, dealerUpcard, dist);
      case 'double':
        return hand.canDouble ? this.doubleEv(hand, dealerUpcard, dist) : 0;
      case 'split':
        return hand.canSplit ? this.splitEv(hand, dealerUpcard, dist) : 0;
      case 'surrender':
        return hand.size === 2 ? SURRENDER_EV : 0;
    }
  }

  private drawOneThenStandEv(hand: Hand, dealerUpcard: Card, dist: DealerDistribution, stake: number): number {
    let ev = 0;
    for (const rank of RANKS) {
      const probability = this.tracker.probability(rank);
      if (probability <= 0) continue;
      // Suit has no effect on value
      const next = hand.withCard(makeCard(dealerUpcard.suit, rank));
      ev += probability * (next.isBust ? -stake : stake * this.standEv(next, dealerUpcard, dist));
    }
    return ev;
  }
}
