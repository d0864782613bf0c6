// Game orchestrator - sequences betting, dealing, insurance, player turns,
// the dealer's turn and settlement for a single player seat.
import type {
  TAction,
  TCardOut,
  TCountSnapshot,
  THandOutcome,
  TInsuranceRecommendation,
  TPhase,
  TRecommendation,
} from '@shared/schemas';
import { type ActionAvailability, StrategyEngine } from './advisor.js';
import { type Card, toCardOut } from './cards.js';
import { CompositionTracker } from './counter.js';
import { TableError } from './errors.js';
import { Hand } from './hand.js';
import { type TableRules, DEFAULT_RULES, settleHand, shouldDealerHit } from './rules.js';
import { type CutCardRange, DEFAULT_CUT_CARD, Shoe } from './shoe.js';
import { logger } from '../utils/logger.js';

export interface TableOptions {
  decks?: number;
  minBet?: number;
  maxBet?: number;
  bankroll?: number;
  rules?: TableRules;
  cutCard?: CutCardRange;
  seed?: number;
  // Pre-built shoe (stacked shoes in tests, replays)
  shoe?: Shoe;
  onEvent?: (event: TableEvent) => void;
}

export type TableEvent =
  | { type: 'card'; target: 'player' | 'dealer' | 'burn'; handIndex?: number; card: TCardOut | null }
  | { type: 'reveal'; card: TCardOut }
  | { type: 'shuffle'; shuffles: number; cutCard: number }
  | { type: 'phase'; from: TPhase; to: TPhase }
  | { type: 'settle'; results: SettlementResult[]; bankroll: number };

export interface SettlementResult {
  handIndex: number;
  cards: TCardOut[];
  total: number;
  bet: number;
  outcome: THandOutcome;
  payout: number;
}

export interface TableStats {
  gamesPlayed: number;
  gamesWon: number;
  gamesLost: number;
  gamesPushed: number;
  winRate: number;
}

export interface HandView {
  cards: TCardOut[];
  total: number;
  soft: boolean;
  bet: number;
  doubled: boolean;
  surrendered: boolean;
  fromSplit: boolean;
  finished: boolean;
  active: boolean;
}

export interface TableSnapshot {
  handNumber: number;
  phase: TPhase;
  bankroll: number;
  insuranceBet: number;
  currentHandIndex: number;
  hands: HandView[];
  dealer: {
    // Hole card is null until the dealer's turn
    cards: Array<TCardOut | null>;
    visibleTotal: number;
  };
  availableActions: TAction[];
  suggestedBet: number;
  count: TCountSnapshot;
  shoe: { cardsRemaining: number; cutCard: number; penetration: number; shuffles: number };
  stats: TableStats;
  results: SettlementResult[];
}

interface PlayerSlot {
  hand: Hand;
  bet: number;
  fromSplit: boolean;
  finished: boolean;
}

export class TableState {
  readonly shoe: Shoe;
  readonly tracker = new CompositionTracker();
  readonly engine: StrategyEngine;
  readonly rules: TableRules;
  readonly minBet: number;
  readonly maxBet: number;

  private phase: TPhase = 'betting';
  private handNumber = 1;
  private bankroll: number;
  private slots: PlayerSlot[] = [];
  private dealer = new Hand();
  private currentIndex = 0;
  private insuranceBet = 0;
  // Shuffle the hole card was dealt in; a later reshuffle resets the tracker past it
  private holeShuffle: number | null = null;
  private lastResults: SettlementResult[] = [];
  private stats = { played: 0, won: 0, lost: 0, pushed: 0 };
  private readonly onEvent: (event: TableEvent) => void;

  constructor(options: TableOptions = {}) {
    this.rules = options.rules ?? DEFAULT_RULES;
    this.minBet = options.minBet ?? 10;
    this.maxBet = options.maxBet ?? 1000;
    this.bankroll = options.bankroll ?? 1000;
    this.onEvent = options.onEvent ?? (() => undefined);
    this.shoe = options.shoe ?? new Shoe({
      decks: options.decks ?? 6,
      seed: options.seed,
      cutCard: options.cutCard ?? DEFAULT_CUT_CARD,
    });
    this.tracker.reset(this.shoe);
    this.engine = new StrategyEngine(this.tracker, this.rules);
  }

  getPhase(): TPhase {
    return this.phase;
  }

  getBankroll(): number {
    return this.bankroll;
  }

  getHandNumber(): number {
    return this.handNumber;
  }

  getDealerHand(): Hand {
    return this.dealer;
  }

  getResults(): SettlementResult[] {
    return this.lastResults;
  }

  // The dealer's second card is dealt face up
  dealerUpcard(): Card | null {
    return this.dealer.cards[1] ?? null;
  }

  getStats(): TableStats {
    const { played, won, lost, pushed } = this.stats;
    return {
      gamesPlayed: played,
      gamesWon: won,
      gamesLost: lost,
      gamesPushed: pushed,
      winRate: played === 0 ? 0 : won / played,
    };
  }

  /**
   * Clears the table for the next bet. A hand whose dealer turn is still being
   * revealed is played out and settled first; a hand waiting on the player is
   * not abandoned.
   */
  startNewHand(): void {
    if (this.phase === 'insurance' || this.phase === 'player-turn') {
      throw new TableError(`Cannot start a new hand during ${this.phase}`);
    }
    if (this.phase === 'dealer-turn') {
      this.playDealerHand();
    }
    if (this.phase === 'dealing') {
      // Bet placed but nothing dealt: refund it
      this.bankroll += this.slots[0]?.bet ?? 0;
    }

    this.handNumber++;
    this.slots = [];
    this.dealer = new Hand();
    this.currentIndex = 0;
    this.insuranceBet = 0;
    this.holeShuffle = null;
    this.lastResults = [];
    this.setPhase('betting');
  }

  placeBet(amount: number): void {
    this.requirePhase('betting', 'place a bet');
    if (amount < this.minBet || amount > this.maxBet) {
      throw new TableError(`Bet must be between ${this.minBet} and ${this.maxBet}`, 400);
    }
    if (amount > this.bankroll) {
      throw new TableError('Bet exceeds bankroll', 400);
    }

    this.bankroll -= amount;
    this.slots = [{ hand: new Hand(), bet: amount, fromSplit: false, finished: false }];
    this.setPhase('dealing');
  }

  dealInitialCards(): void {
    this.requirePhase('dealing', 'deal');

    if (this.shoe.shouldShuffle()) {
      this.reshuffle();
    }

    // Casino practice: burn one before the deal
    this.draw('burn');

    const player = this.slots[0].hand;
    this.dealer = new Hand();
    for (let round = 0; round < 2; round++) {
      player.addCard(this.draw('player', 0));
      this.dealer.addCard(this.draw('dealer', undefined, round === 0));
      if (round === 0) {
        this.holeShuffle = this.shoe.shuffleCount;
      }
    }

    const upcard = this.dealerUpcard();
    if (upcard?.rank === 'A') {
      this.setPhase('insurance');
      return;
    }
    this.resolveNaturalsOrPlay();
  }

  placeInsurance(amount: number): void {
    this.requirePhase('insurance', 'take insurance');
    const limit = this.slots[0].bet / 2;
    if (amount > limit) {
      throw new TableError(`Insurance is limited to half the bet (${limit})`, 400);
    }
    if (amount > this.bankroll) {
      throw new TableError('Insurance exceeds bankroll', 400);
    }
    this.bankroll -= amount;
    this.insuranceBet = amount;
    this.resolveNaturalsOrPlay();
  }

  declineInsurance(): void {
    this.requirePhase('insurance', 'decline insurance');
    this.resolveNaturalsOrPlay();
  }

  applyAction(action: TAction): void {
    switch (action) {
      case 'hit':
        return this.hit();
      case 'stand':
        return this.stand();
      case 'double':
        return this.double();
      case 'split':
        return this.split();
      case 'surrender':
        return this.surrender();
    }
  }

  hit(): void {
    const slot = this.activeSlot('hit');
    slot.hand.addCard(this.draw('player', this.currentIndex));
    this.finishIfComplete(slot);
    this.advanceIfFinished();
  }

  stand(): void {
    const slot = this.activeSlot('stand');
    slot.finished = true;
    this.advanceIfFinished();
  }

  double(): void {
    const slot = this.activeSlot('double');
    const availability = this.availability(slot);
    if (!slot.hand.canDouble || !availability.double) {
      throw new TableError('Double is not available for this hand', 400);
    }

    this.bankroll -= slot.bet;
    slot.bet *= 2;
    slot.hand.addCard(this.draw('player', this.currentIndex));
    slot.hand.markDoubled();
    slot.finished = true;
    this.advanceIfFinished();
  }

  split(): void {
    const slot = this.activeSlot('split');
    if (!slot.hand.canSplit || !this.availability(slot).split) {
      throw new TableError('Split is not available for this hand', 400);
    }

    const moved = slot.hand.removeLast();
    if (!moved) {
      throw new TableError('Split is not available for this hand', 400);
    }
    this.bankroll -= slot.bet;
    slot.fromSplit = true;
    const second: PlayerSlot = { hand: new Hand([moved]), bet: slot.bet, fromSplit: true, finished: false };
    this.slots.splice(this.currentIndex + 1, 0, second);

    slot.hand.addCard(this.draw('player', this.currentIndex));
    second.hand.addCard(this.draw('player', this.currentIndex + 1));
    this.finishIfComplete(slot);
    this.finishIfComplete(second);
    this.advanceIfFinished();
  }

  surrender(): void {
    const slot = this.activeSlot('surrender');
    if (!this.rules.surrenderAllowed || slot.hand.size !== 2) {
      throw new TableError('Surrender is not available for this hand', 400);
    }
    slot.hand.markSurrendered();
    slot.finished = true;
    this.advanceIfFinished();
  }

  availableActions(): TAction[] {
    if (this.phase !== 'player-turn') return [];
    const slot = this.slots[this.currentIndex];
    if (!slot || slot.finished) return [];

    const availability = this.availability(slot);
    const actions: TAction[] = ['hit', 'stand'];
    if (slot.hand.canDouble && availability.double) actions.push('double');
    if (slot.hand.canSplit && availability.split) actions.push('split');
    if (slot.hand.size === 2 && availability.surrender) actions.push('surrender');
    return actions;
  }

  // Nothing left to beat when every hand busted or surrendered
  dealerShouldHit(): boolean {
    const live = this.slots.some(slot => !slot.hand.isBust && !slot.hand.isSurrendered);
    return live && shouldDealerHit(this.dealer, this.rules);
  }

  /** Draws one dealer card if the rules call for it; true when another draw follows. */
  dealerStep(): boolean {
    this.requirePhase('dealer-turn', 'play the dealer');
    if (!this.dealerShouldHit()) return false;
    this.dealer.addCard(this.draw('dealer'));
    return this.dealerShouldHit();
  }

  playDealerHand(): SettlementResult[] {
    this.requirePhase('dealer-turn', 'play the dealer');
    while (this.dealerStep()) {
      // one card per step
    }
    return this.settle();
  }

  settle(): SettlementResult[] {
    this.requirePhase('dealer-turn', 'settle');
    if (this.dealerShouldHit()) {
      throw new TableError('Dealer has not finished drawing');
    }
    return this.finishHand();
  }

  getStrategyRecommendation(): TRecommendation {
    this.requirePhase('player-turn', 'recommend a play');
    const slot = this.slots[this.currentIndex];
    const upcard = this.dealerUpcard();
    if (!slot || !upcard) {
      throw new TableError('No hand to advise on');
    }
    return this.engine.recommend(slot.hand, upcard, this.availability(slot));
  }

  getInsuranceRecommendation(): TInsuranceRecommendation {
    this.requirePhase('insurance', 'recommend insurance');
    return this.engine.insuranceRecommendation();
  }

  suggestedBet(): number {
    const spread = this.minBet * this.countSnapshot().bettingMultiplier;
    return Math.max(0, Math.min(spread, this.maxBet, this.bankroll));
  }

  /** Tracker view as the player sees it: a face-down hole card is still unseen. */
  countSnapshot(): TCountSnapshot {
    const hole = this.dealer.cards[0];
    const hidden = hole !== undefined && !this.isHoleVisible() && this.holeShuffle === this.shoe.shuffleCount;
    return this.tracker.snapshot(hidden ? [hole] : []);
  }

  getState(): TableSnapshot {
    const holeVisible = this.isHoleVisible();
    const upcard = this.dealerUpcard();

    return {
      handNumber: this.handNumber,
      phase: this.phase,
      bankroll: this.bankroll,
      insuranceBet: this.insuranceBet,
      currentHandIndex: this.currentIndex,
      hands: this.slots.map((slot, index) => ({
        cards: slot.hand.cards.map(toCardOut),
        total: slot.hand.total,
        soft: slot.hand.isSoft,
        bet: slot.bet,
        doubled: slot.hand.isDoubled,
        surrendered: slot.hand.isSurrendered,
        fromSplit: slot.fromSplit,
        finished: slot.finished,
        active: this.phase === 'player-turn' && index === this.currentIndex,
      })),
      dealer: {
        cards: this.dealer.cards.map((card, index) => (index === 0 && !holeVisible ? null : toCardOut(card))),
        visibleTotal: holeVisible || !upcard ? this.dealer.total : new Hand([upcard]).total,
      },
      availableActions: this.availableActions(),
      suggestedBet: this.suggestedBet(),
      count: this.countSnapshot(),
      shoe: {
        cardsRemaining: this.shoe.cardsRemaining,
        cutCard: this.shoe.cutCardPosition(),
        penetration: this.shoe.penetration,
        shuffles: this.shoe.shuffleCount,
      },
      stats: this.getStats(),
      results: this.lastResults,
    };
  }

  // Every physical card leaves the shoe here and is observed exactly once
  private draw(target: 'player' | 'dealer' | 'burn', handIndex?: number, hidden: boolean = false): Card {
    if (this.shoe.cardsRemaining === 0) {
      logger.warn(`Shoe ran out during hand ${this.handNumber}, reshuffling`);
      this.reshuffle();
    }
    const card = this.shoe.deal();
    if (!card) {
      throw new TableError('Shoe exhausted mid-hand');
    }
    this.tracker.observe(card);
    this.tracker.assertMatches(this.shoe);

    const shown = target === 'burn' || hidden ? null : toCardOut(card);
    this.onEvent({ type: 'card', target, handIndex, card: shown });
    return card;
  }

  private reshuffle(): void {
    this.shoe.shuffle();
    this.tracker.reset(this.shoe);
    logger.info(`Shoe reshuffled (${this.shoe.size} cards, cut card at ${this.shoe.cutCardPosition()})`);
    this.onEvent({ type: 'shuffle', shuffles: this.shoe.shuffleCount, cutCard: this.shoe.cutCardPosition() });
  }

  private isHoleVisible(): boolean {
    return this.phase === 'dealer-turn' || this.phase === 'finished';
  }

  private resolveNaturalsOrPlay(): void {
    if (this.dealer.isBlackjack || this.slots[0].hand.isBlackjack) {
      this.revealHoleCard();
      this.finishHand();
      return;
    }
    this.setPhase('player-turn');
  }

  private activeSlot(action: TAction): PlayerSlot {
    this.requirePhase('player-turn', action);
    const slot = this.slots[this.currentIndex];
    if (!slot || slot.finished) {
      throw new TableError(`No active hand to ${action}`);
    }
    return slot;
  }

  private availability(slot: PlayerSlot): Required<ActionAvailability> {
    const affordable = this.bankroll >= slot.bet;
    return {
      double: affordable && (!slot.fromSplit || this.rules.doubleAfterSplit),
      split: affordable,
      surrender: this.rules.surrenderAllowed,
    };
  }

  private finishIfComplete(slot: PlayerSlot): void {
    if (slot.hand.isBust || slot.hand.total === 21) {
      slot.finished = true;
    }
  }

  private advanceIfFinished(): void {
    while (this.currentIndex < this.slots.length && this.slots[this.currentIndex].finished) {
      this.currentIndex++;
    }
    if (this.currentIndex >= this.slots.length) {
      this.currentIndex = this.slots.length - 1;
      this.revealHoleCard();
      this.setPhase('dealer-turn');
    }
  }

  private revealHoleCard(): void {
    const hole = this.dealer.cards[0];
    if (hole) {
      this.onEvent({ type: 'reveal', card: toCardOut(hole) });
    }
  }

  private finishHand(): SettlementResult[] {
    const results = this.slots.map((slot, handIndex) => {
      const { outcome, payout } = settleHand(slot.hand, this.dealer, slot.bet, this.rules, !slot.fromSplit);
      return {
        handIndex,
        cards: slot.hand.cards.map(toCardOut),
        total: slot.hand.total,
        bet: slot.bet,
        outcome,
        payout,
      };
    });

    let payout = results.reduce((sum, result) => sum + result.payout, 0);
    if (this.insuranceBet > 0 && this.dealer.isBlackjack) {
      // Insurance pays 2:1
      payout += this.insuranceBet * 3;
    }
    this.bankroll += payout;
    this.insuranceBet = 0;

    for (const { outcome } of results) {
      this.stats.played++;
      if (outcome === 'player-win' || outcome === 'player-blackjack') {
        this.stats.won++;
      } else if (outcome === 'dealer-win' || outcome === 'dealer-blackjack') {
        this.stats.lost++;
      } else if (outcome === 'push') {
        this.stats.pushed++;
      }
    }

    this.lastResults = results;
    this.setPhase('finished');
    logger.info(
      `Hand ${this.handNumber} settled: ${results.map(r => `${r.outcome} (${r.payout})`).join(', ')}; bankroll ${this.bankroll}`
    );
    this.onEvent({ type: 'settle', results, bankroll: this.bankroll });
    return results;
  }

  private requirePhase(phase: TPhase, action: string): void {
    if (this.phase !== phase) {
      throw new TableError(`Cannot ${action} during ${this.phase}`);
    }
  }

  private setPhase(next: TPhase): void {
    const previous = this.phase;
    this.phase = next;
    logger.info(`PHASE TRANSITION: ${previous} -> ${next}`);
    this.onEvent({ type: 'phase', from: previous, to: next });
  }
}
