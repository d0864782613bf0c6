import { type Card, cardLabel, isAce, softValue } from './cards.js';

/**
 * An ordered run of cards plus the doubled/surrendered flags.
 *
 * Totals promote Aces from 1 to 11 one at a time while the hand stays at or
 * under 21, so the result does not depend on card order.
 */
export class Hand {
  private cardList: Card[];
  private doubled = false;
  private surrendered = false;

  constructor(cards: readonly Card[] = []) {
    this.cardList = [...cards];
  }

  get cards(): readonly Card[] {
    return this.cardList;
  }

  get size(): number {
    return this.cardList.length;
  }

  addCard(card: Card): void {
    this.cardList.push(card);
  }

  // Used by split: the second card leaves to seed the new hand
  removeLast(): Card | undefined {
    return this.cardList.pop();
  }

  clear(): void {
    this.cardList = [];
    this.doubled = false;
    this.surrendered = false;
  }

  // Copy of this hand with one more card; flags are not carried over
  withCard(card: Card): Hand {
    return new Hand([...this.cardList, card]);
  }

  /** Sum with every Ace counted as 1. */
  get softTotal(): number {
    return this.cardList.reduce((sum, card) => sum + softValue(card), 0);
  }

  get total(): number {
    let total = this.softTotal;
    for (let i = 0; i < this.aceCount; i++) {
      if (total + 10 > 21) break;
      total += 10;
    }
    return total;
  }

  get hasAce(): boolean {
    return this.cardList.some(isAce);
  }

  get isSoft(): boolean {
    if (!this.hasAce) return false;
    return this.total <= 21 && this.softTotal + 10 <= 21;
  }

  get isBust(): boolean {
    return this.total > 21;
  }

  get isBlackjack(): boolean {
    return this.size === 2 && this.total === 21 && this.hasAce;
  }

  get canSplit(): boolean {
    return this.size === 2 && this.cardList[0].rank === this.cardList[1].rank;
  }

  get canDouble(): boolean {
    return this.size === 2;
  }

  get isDoubled(): boolean {
    return this.doubled;
  }

  get isSurrendered(): boolean {
    return this.surrendered;
  }

  markDoubled(): void {
    this.doubled = true;
  }

  markSurrendered(): void {
    this.surrendered = true;
  }

  label(hideFirst = false): string {
    if (hideFirst && this.size > 0) {
      return ['[XX]', ...this.cardList.slice(1).map(cardLabel)].join(' ');
    }
    return this.cardList.map(cardLabel).join(' ');
  }

  private get aceCount(): number {
    return this.cardList.filter(isAce).length;
  }
}
