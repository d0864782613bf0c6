import type { TableRules } from './engine/rules.js';
import { type CutCardRange, MIN_CUT_CARD } from './engine/shoe.js';
import { type LogLevel, defaultLogLevel, isLogLevel } from './utils/logger.js';

type Env = NodeJS.ProcessEnv;

// Configuration from environment variables
export interface Config {
  port: number;
  corsOrigins: string[];
  logLevel: LogLevel;

  // Table
  decks: number;
  minBet: number;
  maxBet: number;
  startingBankroll: number;
  cutCard: CutCardRange;
  shoeSeed: number | undefined;
  rules: TableRules;

  // Dealer turn pacing
  dealerRevealMs: number;
}

function getEnv(env: Env, key: string, defaultValue: string): string {
  const value = env[key];
  return value === undefined || value === '' ? defaultValue : value;
}

function getEnvNumber(env: Env, key: string, defaultValue: number): number {
  const value = env[key];
  if (value === undefined || value === '') return defaultValue;
  const parsed = Number(value);
  if (Number.isNaN(parsed)) {
    throw new Error(`Invalid number for ${key}: ${value}`);
  }
  return parsed;
}

function getEnvInt(env: Env, key: string, defaultValue: number, min: number = 0): number {
  const parsed = getEnvNumber(env, key, defaultValue);
  if (!Number.isInteger(parsed) || parsed < min) {
    throw new Error(`Invalid integer for ${key}: ${parsed} (minimum ${min})`);
  }
  return parsed;
}

function getEnvBool(env: Env, key: string, defaultValue: boolean): boolean {
  const value = env[key]?.toLowerCase();
  if (value === undefined || value === '') return defaultValue;
  if (value === 'true' || value === '1') return true;
  if (value === 'false' || value === '0') return false;
  throw new Error(`Invalid boolean for ${key}: ${value}`);
}

export function loadConfig(env: Env = process.env): Config {
  const logLevel = env.LOG_LEVEL?.toLowerCase();
  if (logLevel && !isLogLevel(logLevel)) {
    throw new Error(`Invalid LOG_LEVEL: ${logLevel}`);
  }

  const cutCard = {
    min: getEnvInt(env, 'CUT_CARD_MIN', 60, MIN_CUT_CARD),
    max: getEnvInt(env, 'CUT_CARD_MAX', 75, MIN_CUT_CARD),
  };
  if (cutCard.min > cutCard.max) {
    throw new Error(`CUT_CARD_MIN (${cutCard.min}) exceeds CUT_CARD_MAX (${cutCard.max})`);
  }

  const minBet = getEnvNumber(env, 'MIN_BET', 10);
  const maxBet = getEnvNumber(env, 'MAX_BET', 1000);
  if (minBet <= 0 || maxBet < minBet) {
    throw new Error(`Invalid bet limits: MIN_BET=${minBet}, MAX_BET=${maxBet}`);
  }

  const seed = env.SHOE_SEED;

  return {
    port: getEnvInt(env, 'PORT', 3001),
    corsOrigins: getEnv(env, 'CORS_ORIGINS', 'http://localhost:5173').split(',').map(origin => origin.trim()),
    logLevel: logLevel && isLogLevel(logLevel) ? logLevel : defaultLogLevel(env),

    decks: getEnvInt(env, 'NUM_DECKS', 6, 1),
    minBet,
    maxBet,
    startingBankroll: getEnvNumber(env, 'STARTING_BANKROLL', 1000),
    cutCard,
    shoeSeed: seed === undefined || seed === '' ? undefined : getEnvInt(env, 'SHOE_SEED', 0),
    rules: {
      dealerHitsSoft17: getEnvBool(env, 'DEALER_HITS_SOFT_17', true),
      doubleAfterSplit: getEnvBool(env, 'DOUBLE_AFTER_SPLIT', true),
      surrenderAllowed: getEnvBool(env, 'SURRENDER_ALLOWED', true),
      blackjackPayout: getEnvNumber(env, 'BLACKJACK_PAYOUT', 1.5),
    },

    dealerRevealMs: getEnvInt(env, 'DEALER_REVEAL_MS', 1000),
  };
}
