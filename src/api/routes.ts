import type { FastifyInstance, FastifyReply, FastifyRequest } from 'fastify';
import { z } from 'zod';
import type { AppConfig } from '../config.js';
import { isTenderPhase } from '../domain/tender/phaseMachine.js';
import { DomainError, ErrorCode, toErrorEnvelope } from '../errors/taxonomy.js';
import type { RegistryService } from '../services/registryService.js';
import { MAX_TENDER_DURATION_SECONDS } from '../services/tenderService.js';
import type { TenderService } from '../services/tenderService.js';
import type { RuntimeMetrics } from '../types.js';
import { connectedClients } from './websocket.js';

interface RouteDeps {
  config: AppConfig;
  tenderService: TenderService;
  registryService: RegistryService | null;
  getRuntimeMetrics: () => RuntimeMetrics;
}

export const CALLER_HEADER = 'x-caller-id';

const createTenderSchema = z.object({
  descriptorUri: z.string().min(1).max(2048),
  durationSeconds: z.number().int().positive().max(MAX_TENDER_DURATION_SECONDS).optional(),
  requiredYesVotes: z.number().int().positive().optional(),
});

const tenderParamsSchema = z.object({
  tenderId: z.string().min(1),
});

const proposalParamsSchema = tenderParamsSchema.extend({
  proposalId: z.coerce.number().int().nonnegative(),
});

const submitProposalSchema = z.object({
  companyId: z.number().int().nonnegative(),
  descriptorUri: z.string().min(1).max(2048),
});

const awardSchema = z.object({
  fundingAmount: z.number().nonnegative(),
});

const transferAdminSchema = z.object({
  newAdmin: z.string().trim().min(1).max(256),
});

const registerCompanySchema = z.object({
  id: z.number().int().nonnegative(),
  name: z.string().min(1).max(200),
  representative: z.string().min(1).max(256),
});

const depositSchema = z.object({
  amount: z.number().positive(),
});

const sendDomainError = (reply: FastifyReply, error: unknown): void => {
  if (error instanceof DomainError) {
    void reply.code(error.statusCode).send(toErrorEnvelope(error.code, error.message, error.details));
    return;
  }

  void reply.code(500).send(toErrorEnvelope(
    ErrorCode.InternalError,
    'Unexpected internal error',
    { error: String(error) },
  ));
};

const parseOrThrow = <S extends z.ZodTypeAny>(schema: S, input: unknown, label: string): z.infer<S> => {
  const parse = schema.safeParse(input);
  if (!parse.success) {
    throw new DomainError(ErrorCode.InvalidPayload, 400, `Invalid ${label}.`, { ...parse.error.flatten() });
  }
  return parse.data;
};

const callerOf = (request: FastifyRequest): string => {
  const header = request.headers[CALLER_HEADER];
  const caller = (Array.isArray(header) ? header[0] : header)?.trim();
  if (!caller) {
    throw new DomainError(
      ErrorCode.MissingCallerId,
      401,
      `Missing ${CALLER_HEADER} header.`,
    );
  }
  return caller;
};

const requireOperator = (request: FastifyRequest, operatorId: string): string => {
  const caller = callerOf(request);
  if (!operatorId || caller !== operatorId) {
    throw new DomainError(
      ErrorCode.UnauthorizedCaller,
      403,
      operatorId ? 'Only the registry operator may change the local registry.' : 'No registry operator is configured.',
    );
  }
  return caller;
};

/**
 * Wrap a handler so DomainErrors (validation, guards, collaborators) become
 * error envelopes.
 */
const handle = <T>(work: (request: FastifyRequest, reply: FastifyReply) => Promise<T> | T) => (
  async (request: FastifyRequest, reply: FastifyReply): Promise<T | undefined> => {
    try {
      return await work(request, reply);
    } catch (error) {
      sendDomainError(reply, error);
      return undefined;
    }
  }
);

export async function registerRoutes(app: FastifyInstance, deps: RouteDeps): Promise<void> {
  const { tenderService, registryService } = deps;

  app.get('/', async () => ({
    name: deps.config.app.name,
    status: 'ok',
    collaborators: deps.config.collaborators.mode,
  }));

  app.get('/metrics', async () => ({
    metrics: deps.getRuntimeMetrics(),
    websocketClients: connectedClients(),
  }));

  // ─── Tenders ────────────────────────────────────────────────────────

  app.post('/tenders', handle(async (request, reply) => {
    const admin = callerOf(request);
    const body = parseOrThrow(createTenderSchema, request.body, 'request payload');
    const tender = await tenderService.createTender({ admin, ...body });
    return reply.code(201).send({ tender });
  }));

  app.get('/tenders', handle(async (request) => {
    const { phase } = parseOrThrow(z.object({ phase: z.string().optional() }), request.query, 'query params');
    if (phase === undefined) return { tenders: tenderService.listTenders() };
    if (!isTenderPhase(phase)) {
      throw new DomainError(ErrorCode.InvalidPayload, 400, `Unknown phase '${phase}'.`);
    }
    return { tenders: tenderService.listTenders(phase) };
  }));

  app.get('/tenders/:tenderId', handle(async (request) => {
    const { tenderId } = parseOrThrow(tenderParamsSchema, request.params, 'path params');
    const tender = tenderService.getTender(tenderId);
    if (!tender) {
      throw new DomainError(ErrorCode.TenderNotFound, 404, 'Tender not found.', { tenderId });
    }
    return { tender };
  }));

  app.post('/tenders/:tenderId/approval-votes', handle(async (request) => {
    const voterId = callerOf(request);
    const { tenderId } = parseOrThrow(tenderParamsSchema, request.params, 'path params');
    return { tender: await tenderService.castApprovalVote(tenderId, voterId) };
  }));

  // ─── Proposals ──────────────────────────────────────────────────────

  app.get('/tenders/:tenderId/proposals', handle(async (request) => {
    const { tenderId } = parseOrThrow(tenderParamsSchema, request.params, 'path params');
    return { proposals: tenderService.listProposals(tenderId) };
  }));

  app.post('/tenders/:tenderId/proposals', handle(async (request, reply) => {
    const callerId = callerOf(request);
    const { tenderId } = parseOrThrow(tenderParamsSchema, request.params, 'path params');
    const body = parseOrThrow(submitProposalSchema, request.body, 'request payload');
    const proposal = await tenderService.submitProposal(tenderId, body, callerId);
    return reply.code(201).send({ proposal });
  }));

  app.post('/tenders/:tenderId/proposals/:proposalId/votes', handle(async (request) => {
    const voterId = callerOf(request);
    const { tenderId, proposalId } = parseOrThrow(proposalParamsSchema, request.params, 'path params');
    return { tender: await tenderService.voteForProposal(tenderId, proposalId, voterId) };
  }));

  // ─── Admin ──────────────────────────────────────────────────────────

  const adminTransitions = {
    approve: (tenderId: string, callerId: string) => tenderService.overrideAndApprove(tenderId, callerId),
    decline: (tenderId: string, callerId: string) => tenderService.overrideAndDecline(tenderId, callerId),
    'open-proposals': (tenderId: string, callerId: string) => tenderService.openTenderForProposals(tenderId, callerId),
    'close-proposals': (tenderId: string, callerId: string) => tenderService.closeProposingAndOpenVoting(tenderId, callerId),
    'close-proposal-voting': (tenderId: string, callerId: string) => tenderService.closeProposalVoting(tenderId, callerId),
  };

  for (const [action, run] of Object.entries(adminTransitions)) {
    app.post(`/tenders/:tenderId/admin/${action}`, handle(async (request) => {
      const callerId = callerOf(request);
      const { tenderId } = parseOrThrow(tenderParamsSchema, request.params, 'path params');
      return { tender: await run(tenderId, callerId) };
    }));
  }

  app.post('/tenders/:tenderId/admin/award', handle(async (request) => {
    const callerId = callerOf(request);
    const { tenderId } = parseOrThrow(tenderParamsSchema, request.params, 'path params');
    const { fundingAmount } = parseOrThrow(awardSchema, request.body, 'request payload');
    return tenderService.awardProposal(tenderId, fundingAmount, callerId);
  }));

  app.post('/tenders/:tenderId/admin/transfer', handle(async (request) => {
    const callerId = callerOf(request);
    const { tenderId } = parseOrThrow(tenderParamsSchema, request.params, 'path params');
    const { newAdmin } = parseOrThrow(transferAdminSchema, request.body, 'request payload');
    return { tender: await tenderService.updateAdmin(tenderId, newAdmin, callerId) };
  }));

  // ─── Local collaborators ────────────────────────────────────────────

  if (!registryService) return;

  app.get('/registry/companies', async () => ({ companies: registryService.listCompanies() }));

  app.post('/registry/companies', handle(async (request, reply) => {
    requireOperator(request, deps.config.registry.operatorId);
    const body = parseOrThrow(registerCompanySchema, request.body, 'request payload');
    const company = await registryService.registerCompany(body);
    return reply.code(201).send({ company });
  }));

  app.get('/ledger', async () => ({ ledger: registryService.getLedger() }));

  app.post('/ledger/deposits', handle(async (request) => {
    requireOperator(request, deps.config.registry.operatorId);
    const { amount } = parseOrThrow(depositSchema, request.body, 'request payload');
    return { ledger: await registryService.deposit(amount) };
  }));

  app.get('/projects', handle(async (request) => {
    const query = parseOrThrow(z.object({ tenderId: z.string().optional() }), request.query, 'query params');
    return { projects: registryService.listProjects(query.tenderId) };
  }));
}
