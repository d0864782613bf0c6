import type { TAction, TNewGameIn } from '@shared/schemas';
import type { Config } from '../config.js';
import { RevealScheduler } from '../engine/reveal.js';
import type { Shoe } from '../engine/shoe.js';
import { type TableEvent, type TableSnapshot, TableState } from '../engine/state.js';
import { logger } from '../utils/logger.js';
import type { WebSocketMessage } from './ws.js';

export interface EventSink {
  broadcast(message: WebSocketMessage): void;
}

export type TableSettings = Pick<
  Config,
  'decks' | 'minBet' | 'maxBet' | 'startingBankroll' | 'cutCard' | 'shoeSeed' | 'rules' | 'dealerRevealMs'
>;

/**
 * Owns the live table and paces the dealer's turn. Every mutation from the
 * outside world goes through here so a pending reveal can never touch a table
 * that was replaced or moved on.
 */
export class TableSession {
  private current: TableState;
  private readonly reveal: RevealScheduler;

  constructor(
    private readonly settings: TableSettings,
    private readonly events: EventSink,
    // Tests hand in stacked shoes
    private readonly createShoe?: (input: TNewGameIn) => Shoe
  ) {
    this.reveal = new RevealScheduler(settings.dealerRevealMs);
    this.current = this.createTable({});
  }

  get table(): TableState {
    return this.current;
  }

  get revealPending(): boolean {
    return this.reveal.pending;
  }

  getState(): TableSnapshot {
    return this.current.getState();
  }

  newGame(input: TNewGameIn): TableSnapshot {
    this.reveal.cancel();
    this.current = this.createTable(input);
    logger.info(`New game: ${this.current.shoe.decks} deck(s), bankroll ${this.current.getBankroll()}`);
    return this.changed();
  }

  nextHand(): TableSnapshot {
    this.reveal.cancel();
    this.current.startNewHand();
    return this.changed();
  }

  bet(amount: number): TableSnapshot {
    this.current.placeBet(amount);
    return this.changed();
  }

  deal(): TableSnapshot {
    this.current.dealInitialCards();
    return this.changed();
  }

  act(action: TAction): TableSnapshot {
    this.current.applyAction(action);
    return this.changed();
  }

  takeInsurance(amount: number): TableSnapshot {
    this.current.placeInsurance(amount);
    return this.changed();
  }

  declineInsurance(): TableSnapshot {
    this.current.declineInsurance();
    return this.changed();
  }

  stop(): void {
    this.reveal.cancel();
  }

  private changed(): TableSnapshot {
    if (this.current.getPhase() === 'dealer-turn' && !this.reveal.pending) {
      this.startReveal();
    }
    const state = this.current.getState();
    this.events.broadcast({ type: 'state', state });
    return state;
  }

  private startReveal(): void {
    const table = this.current;
    this.reveal.start({
      step: () => {
        const more = table.dealerStep();
        this.events.broadcast({ type: 'state', state: table.getState() });
        return more;
      },
      onDone: () => {
        table.settle();
        this.events.broadcast({ type: 'state', state: table.getState() });
      },
      onError: (error) => {
        logger.error('Dealer turn failed:', error);
        this.events.broadcast({
          type: 'error',
          message: error instanceof Error ? error.message : String(error),
          context: { phase: table.getPhase(), operation: 'dealer-turn' },
        });
      },
    });
  }

  private createTable(input: TNewGameIn): TableState {
    const { settings } = this;
    return new TableState({
      decks: input.decks ?? settings.decks,
      seed: input.seed ?? settings.shoeSeed,
      bankroll: input.bankroll ?? settings.startingBankroll,
      minBet: settings.minBet,
      maxBet: settings.maxBet,
      rules: settings.rules,
      cutCard: settings.cutCard,
      shoe: this.createShoe?.(input),
      onEvent: (event: TableEvent) => this.events.broadcast(event),
    });
  }
}
