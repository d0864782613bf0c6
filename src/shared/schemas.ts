import { z } from "zod";

// Declaration order of Action is the tie-break order used by the advisor.
export const Action = z.enum(["hit","stand","double","split","surrender"]);
export const Suit = z.enum(["hearts","diamonds","clubs","spades"]);
export const Rank = z.enum(["A","2","3","4","5","6","7","8","9","10","J","Q","K"]);
export const Phase = z.enum(["betting","dealing","insurance","player-turn","dealer-turn","finished"]);
export const CountStatus = z.enum(["Very Favorable","Favorable","Neutral","Unfavorable","Very Unfavorable"]);
export const HandOutcome = z.enum([
  "player-win","dealer-win","push","player-blackjack","dealer-blackjack","player-surrender",
]);

export const CardOut = z.object({
  suit: Suit,
  rank: Rank,
  label: z.string(),
});

export const ActionEvs = z.object({
  hit: z.number().optional(),
  stand: z.number().optional(),
  double: z.number().optional(),
  split: z.number().optional(),
  surrender: z.number().optional(),
});

export const Recommendation = z.object({
  optimalAction: Action,
  optimalEv: z.number(),
  basicAction: Action,
  basicEv: z.number(),
  evDifference: z.number(),
  countAdvantage: z.boolean(),
  actionEvs: ActionEvs,
});

export const InsuranceRecommendation = z.object({
  shouldTakeInsurance: z.boolean(),
  insuranceEv: z.number(),
  basicEv: z.number(),
  dealerBlackjackProbability: z.number().min(0).max(1),
  countAdvantage: z.boolean(),
});

export const CountSnapshot = z.object({
  runningCount: z.number().int(),
  trueCount: z.number(),
  cardsSeen: z.number().int().nonnegative(),
  cardsRemaining: z.number().int().nonnegative(),
  decksRemaining: z.number().nonnegative(),
  penetration: z.number().min(0).max(1),
  status: CountStatus,
  bettingMultiplier: z.number().min(1),
  remaining: z.record(Rank, z.number().int()),
});

export const NewGameIn = z.object({
  bankroll: z.number().positive().optional(),
  decks: z.number().int().min(1).max(8).optional(),
  seed: z.number().int().optional(),
});

export const BetIn = z.object({ amount: z.number().positive() });
export const ActionIn = z.object({ action: Action });
export const InsuranceIn = z.object({ amount: z.number().positive() });

export const BustProbabilityQuery = z.object({
  total: z.coerce.number().int().min(2).max(31),
  role: z.enum(["player","dealer"]).default("player"),
  soft: z.enum(["true","false"]).default("false").transform((v) => v === "true"),
});

export type TAction         = z.infer<typeof Action>;
export type TSuit           = z.infer<typeof Suit>;
export type TRank           = z.infer<typeof Rank>;
export type TPhase          = z.infer<typeof Phase>;
export type TCountStatus    = z.infer<typeof CountStatus>;
export type THandOutcome    = z.infer<typeof HandOutcome>;
export type TCardOut        = z.infer<typeof CardOut>;
export type TActionEvs      = z.infer<typeof ActionEvs>;
export type TRecommendation = z.infer<typeof Recommendation>;
export type TInsuranceRecommendation = z.infer<typeof InsuranceRecommendation>;
export type TCountSnapshot  = z.infer<typeof CountSnapshot>;
export type TNewGameIn      = z.infer<typeof NewGameIn>;
export type TBustProbabilityQuery = z.infer<typeof BustProbabilityQuery>;
