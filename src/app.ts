import Fastify from 'fastify';
import type { FastifyInstance } from 'fastify';
import fastifyWebSocket from '@fastify/websocket';
import { registerRoutes } from './api/routes.js';
import { registerWebSocket } from './api/websocket.js';
import type { AppConfig } from './config.js';
import { EventLogger } from './infra/logger.js';
import { StateStore } from './infra/storage/stateStore.js';
import { HttpCollaboratorClient } from './integrations/collaborators/httpClient.js';
import { localCollaborators } from './integrations/collaborators/localCollaborators.js';
import type { CollaboratorSuite } from './integrations/collaborators/types.js';
import { RegistryService } from './services/registryService.js';
import { TenderService } from './services/tenderService.js';

export interface AppContext {
  app: FastifyInstance;
  tenderService: TenderService;
  registryService: RegistryService | null;
  stateStore: StateStore;
  logger: EventLogger;
}

export interface BuildAppOptions {
  /** Replaces the configured collaborators, e.g. with test doubles. */
  collaborators?: CollaboratorSuite;
  now?: () => number;
}

const resolveCollaborators = (config: AppConfig): CollaboratorSuite => {
  if (config.collaborators.mode === 'http') {
    return new HttpCollaboratorClient({
      companyDirectoryUrl: config.collaborators.companyDirectoryUrl,
      fundingLedgerUrl: config.collaborators.fundingLedgerUrl,
      projectFactoryUrl: config.collaborators.projectFactoryUrl,
      apiKey: config.collaborators.apiKey,
      timeoutMs: config.collaborators.timeoutMs,
    });
  }
  return localCollaborators;
};

export async function buildApp(config: AppConfig, options: BuildAppOptions = {}): Promise<AppContext> {
  const app = Fastify({
    logger: false,
  });

  // Register WebSocket plugin first so routes can use { websocket: true }.
  await app.register(fastifyWebSocket);

  const stateStore = new StateStore(config.paths.stateFile, config.ledger.initialBalance);
  await stateStore.init();

  const logger = new EventLogger(config.paths.logFile);
  await logger.init();

  const collaborators = options.collaborators ?? resolveCollaborators(config);
  const tenderService = new TenderService(stateStore, logger, collaborators, {
    defaultDurationSeconds: config.tender.defaultDurationSeconds,
    defaultRequiredYesVotes: config.tender.defaultRequiredYesVotes,
    minProposalsToVote: config.tender.minProposalsToVote,
    now: options.now,
  });
  const registryService = collaborators === localCollaborators ? new RegistryService(stateStore) : null;

  await registerRoutes(app, {
    config,
    tenderService,
    registryService,
    getRuntimeMetrics: () => stateStore.snapshot().metrics,
  });

  const unsubscribe = await registerWebSocket(app);
  app.addHook('onClose', async () => {
    unsubscribe();
  });

  return {
    app,
    tenderService,
    registryService,
    stateStore,
    logger,
  };
}
