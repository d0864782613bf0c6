import express, { type ErrorRequestHandler } from 'express';
import { ZodError } from 'zod';
import { ActionIn, BetIn, BustProbabilityQuery, InsuranceIn, NewGameIn } from '@shared/schemas';
import { ActionUnavailableError, InvariantViolationError, TableError } from '../engine/errors.js';
import { logger } from '../utils/logger.js';
import type { TableSession } from './session.js';

export function createHttpRouter(session: TableSession): express.Router {
  const router = express.Router();

  // GET /health - Health check
  router.get('/health', (_req, res) => {
    res.json({ ok: true, service: 'blackjack-ev-trainer' });
  });

  // GET /state - Current table state (hole card hidden until the dealer's turn)
  router.get('/state', (_req, res) => {
    res.json(session.getState());
  });

  // GET /count - Composition tracker snapshot (a face-down hole card counts as unseen)
  router.get('/count', (_req, res) => {
    res.json(session.table.countSnapshot());
  });

  // GET /recommendation - EV-optimal vs basic strategy for the active hand
  router.get('/recommendation', (_req, res) => {
    res.json(session.table.getStrategyRecommendation());
  });

  // GET /insurance-recommendation - Only while insurance is offered
  router.get('/insurance-recommendation', (_req, res) => {
    res.json(session.table.getInsuranceRecommendation());
  });

  // GET /bust-probability?total=&role=&soft=
  router.get('/bust-probability', (req, res) => {
    const { total, role, soft } = BustProbabilityQuery.parse(req.query);
    res.json({ total, role, soft, probability: session.table.engine.bustProbability(total, role, soft) });
  });

  // POST /new-game - Fresh shoe, tracker and bankroll
  router.post('/new-game', (req, res) => {
    const input = NewGameIn.parse(req.body ?? {});
    res.json({ success: true, state: session.newGame(input) });
  });

  // POST /next - Start next hand
  router.post('/next', (_req, res) => {
    const state = session.nextHand();
    res.json({ startedHand: state.handNumber, state });
  });

  // POST /bet - Place a bet
  router.post('/bet', (req, res) => {
    const { amount } = BetIn.parse(req.body);
    res.json({ success: true, state: session.bet(amount) });
  });

  // POST /deal - Burn one and deal the initial cards
  router.post('/deal', (_req, res) => {
    res.json({ success: true, state: session.deal() });
  });

  // POST /action - Player action on the active hand
  router.post('/action', (req, res) => {
    const { action } = ActionIn.parse(req.body);
    res.json({ success: true, state: session.act(action) });
  });

  // POST /insurance - Take insurance
  router.post('/insurance', (req, res) => {
    const { amount } = InsuranceIn.parse(req.body);
    res.json({ success: true, state: session.takeInsurance(amount) });
  });

  // POST /insurance/decline
  router.post('/insurance/decline', (_req, res) => {
    res.json({ success: true, state: session.declineInsurance() });
  });

  router.use(handleApiError);

  return router;
}

export const handleApiError: ErrorRequestHandler = (error, req, res, _next) => {
  if (error instanceof ZodError) {
    res.status(400).json({ error: 'Invalid request', issues: error.issues });
    return;
  }
  if (error instanceof TableError) {
    res.status(error.status).json({ error: error.message });
    return;
  }
  if (error instanceof ActionUnavailableError) {
    res.status(400).json({ error: error.message });
    return;
  }
  if (error instanceof InvariantViolationError) {
    logger.error(`Invariant violated during ${req.method} ${req.path}:`, error);
    res.status(500).json({ error: error.message });
    return;
  }

  logger.error(`Error handling ${req.method} ${req.path}:`, error);
  res.status(500).json({ error: 'Internal server error' });
};
