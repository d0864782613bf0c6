// Must load first: starts the OpenTelemetry SDK before express and http are required
import { shutdownTelemetry } from './instrumentation.js';
import express from 'express';
import cors from 'cors';
import { createServer } from 'http';
import { loadConfig } from './config.js';
import { createHttpRouter } from './api/http.js';
import { TableSession } from './api/session.js';
import { eventsBroadcaster } from './api/ws.js';
import { logger } from './utils/logger.js';

const config = loadConfig();
logger.setLevel(config.logLevel);

const session = new TableSession(config, eventsBroadcaster);
const app = express();

// Middleware
app.use(cors({
  origin: config.corsOrigins,
  credentials: true
}));
app.use(express.json());

// Routes
app.use('/api', createHttpRouter(session));

// Create HTTP server and initialize WebSocket
const server = createServer(app);
eventsBroadcaster.initialize(server, () => session.getState());

server.listen(config.port, () => {
  logger.info(`Blackjack EV trainer running on port ${config.port}`);
  logger.info(`WebSocket events available at ws://localhost:${config.port}/events`);
  logger.info(`CORS origins: ${config.corsOrigins.join(', ')}`);
  logger.info(`Table: ${config.decks} deck(s), bets ${config.minBet}-${config.maxBet}, ` +
    `${config.rules.dealerHitsSoft17 ? 'H17' : 'S17'}`);
});

// Graceful shutdown
function shutdown(signal: string): void {
  logger.info(`${signal} received, shutting down gracefully...`);
  session.stop();
  eventsBroadcaster.close();
  server.close(() => {
    void shutdownTelemetry()
      .catch((error: unknown) => logger.error('Telemetry shutdown failed:', error))
      .finally(() => process.exit(0));
  });
}

process.on('SIGINT', () => shutdown('SIGINT'));
process.on('SIGTERM', () => shutdown('SIGTERM'));
