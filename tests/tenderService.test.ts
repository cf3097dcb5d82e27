import fs from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { TRANSITIONS, nextPhase } from '../src/domain/tender/phaseMachine.js';
import type { Tender } from '../src/domain/tender/tenderTypes.js';
import { DomainError, ErrorCode } from '../src/errors/taxonomy.js';
import { eventBus } from '../src/infra/eventBus.js';
import { EventLogger } from '../src/infra/logger.js';
import { StateStore } from '../src/infra/storage/stateStore.js';
import {
  CollaboratorRejectedError,
  CompanyNotRegisteredError,
} from '../src/integrations/collaborators/errorMapping.js';
import { localCollaborators } from '../src/integrations/collaborators/localCollaborators.js';
import type { CollaboratorSuite } from '../src/integrations/collaborators/types.js';
import { RegistryService } from '../src/services/registryService.js';
import { MAX_TENDER_DURATION_SECONDS, TenderService } from '../src/services/tenderService.js';

const START = Date.parse('2026-01-01T00:00:00.000Z');

let dir: string;

beforeEach(async () => {
  dir = await fs.mkdtemp(path.join(os.tmpdir(), 'tender-service-'));
});

afterEach(async () => {
  eventBus.clear();
  await fs.rm(dir, { recursive: true, force: true });
});

function fakeCollaborators(representatives: Record<number, string>) {
  const lookupCompany = vi.fn(async (companyId: number): Promise<string> => {
    const representative = representatives[companyId];
    if (!representative) throw new CompanyNotRegisteredError(companyId);
    return representative;
  });
  const createProject = vi.fn(async (_tenderId: string, _companyId: number): Promise<string> => 'project-1');
  const disburse = vi.fn(async (_amount: number, _projectId: string): Promise<void> => undefined);

  const suite: CollaboratorSuite = {
    refs: { companyDirectory: 'fake-directory', fundingLedger: 'fake-ledger' },
    bind: () => ({
      companyDirectory: { lookupCompany },
      projectFactory: { createProject },
      fundingLedger: { disburse },
    }),
  };

  return { suite, lookupCompany, createProject, disburse };
}

async function setup(opts: {
  collaborators?: CollaboratorSuite;
  initialBalance?: number;
  requiredYesVotes?: number;
  minProposalsToVote?: number;
  logger?: EventLogger;
} = {}) {
  const store = new StateStore(path.join(dir, 'state.json'), opts.initialBalance ?? 100_000);
  await store.init();
  const logger = opts.logger ?? new EventLogger(path.join(dir, 'events.ndjson'));
  await logger.init();

  let clock = START;
  const service = new TenderService(store, logger, opts.collaborators ?? localCollaborators, {
    defaultDurationSeconds: 1000,
    defaultRequiredYesVotes: opts.requiredYesVotes ?? 3,
    minProposalsToVote: opts.minProposalsToVote ?? 1,
    now: () => clock,
  });
  const registry = new RegistryService(store);

  return {
    store,
    service,
    registry,
    advance: (ms: number) => {
      clock += ms;
    },
  };
}

async function errorOf(promise: Promise<unknown>): Promise<DomainError> {
  const error = await promise.then(() => null, (e: unknown) => e);
  if (!(error instanceof DomainError)) {
    throw new Error(`expected a DomainError, got ${String(error)}`);
  }
  return error;
}

/** Tender in proposal_voting with proposals 0 (company 1) and 1 (company 2). */
async function tenderInProposalVoting(service: TenderService): Promise<Tender> {
  const tender = await service.createTender({ admin: 'admin', descriptorUri: 'ipfs://tender', requiredYesVotes: 1 });
  await service.castApprovalVote(tender.id, 'voter-1');
  await service.openTenderForProposals(tender.id, 'admin');
  await service.submitProposal(tender.id, { companyId: 1, descriptorUri: 'ipfs://A' }, 'rep-a');
  await service.submitProposal(tender.id, { companyId: 2, descriptorUri: 'ipfs://B' }, 'rep-b');
  return service.closeProposingAndOpenVoting(tender.id, 'admin');
}

describe('TenderService', () => {
  describe('createTender', () => {
    it('starts in voting with the deadline duration seconds ahead', async () => {
      const { service } = await setup();
      const tender = await service.createTender({
        admin: 'admin',
        descriptorUri: 'ipfs://tender',
        durationSeconds: 1000,
        requiredYesVotes: 2,
      });

      expect(tender.phase).toBe('voting');
      expect(tender.admin).toBe('admin');
      expect(tender.createdAt).toBe('2026-01-01T00:00:00.000Z');
      expect(tender.votingDeadline).toBe('2026-01-01T00:16:40.000Z');
      expect(tender.requiredYesVotes).toBe(2);
      expect(tender.yesVoteCount).toBe(0);
      expect(tender.currentWinningProposalIndex).toBe(0);
      expect(tender.winningProposalIndex).toBeNull();
      expect(tender.awardedProjectRef).toBeNull();
      expect(tender.companyDirectoryRef).toBe('local:company-directory');
      expect(tender.fundingLedgerRef).toBe('local:funding-ledger');
      expect(service.getTender(tender.id)?.id).toBe(tender.id);
    });

    it('falls back to configured defaults', async () => {
      const { service } = await setup({ requiredYesVotes: 5 });
      const tender = await service.createTender({ admin: 'admin', descriptorUri: 'ipfs://tender' });
      expect(tender.requiredYesVotes).toBe(5);
      expect(tender.votingDeadline).toBe('2026-01-01T00:16:40.000Z');
    });

    it('rejects a zero vote threshold', async () => {
      const { service } = await setup();
      const error = await errorOf(service.createTender({ admin: 'admin', descriptorUri: 'x', requiredYesVotes: 0 }));
      expect(error.code).toBe(ErrorCode.InvalidPayload);
    });

    it('rejects a voting window too long to date', async () => {
      const { service } = await setup();

      const tooLong = await errorOf(service.createTender({
        admin: 'admin',
        descriptorUri: 'x',
        durationSeconds: MAX_TENDER_DURATION_SECONDS + 1,
      }));
      const absurd = await errorOf(service.createTender({ admin: 'admin', descriptorUri: 'x', durationSeconds: 1e17 }));

      expect(tooLong.code).toBe(ErrorCode.InvalidPayload);
      expect(absurd.code).toBe(ErrorCode.InvalidPayload);
      expect(absurd.statusCode).toBe(400);
      expect(service.listTenders()).toEqual([]);
    });
  });

  describe('castApprovalVote', () => {
    it('approves within the call that reaches the threshold', async () => {
      const { service } = await setup();
      const tender = await service.createTender({ admin: 'admin', descriptorUri: 'x', requiredYesVotes: 3 });

      const afterFirst = await service.castApprovalVote(tender.id, 'voter-1');
      const afterSecond = await service.castApprovalVote(tender.id, 'voter-2');
      expect(afterFirst.phase).toBe('voting');
      expect(afterSecond.phase).toBe('voting');
      expect(afterSecond.yesVoteCount).toBe(2);

      const afterThird = await service.castApprovalVote(tender.id, 'voter-3');
      expect(afterThird.phase).toBe('approved');
      expect(afterThird.yesVoteCount).toBe(3);
      expect(afterThird.phaseHistory).toHaveLength(1);
      expect(afterThird.phaseHistory[0]).toMatchObject({
        from: 'voting',
        to: 'approved',
        action: 'approvalThresholdReached',
      });
    });

    it('rejects a second vote from the same voter and keeps the count', async () => {
      const { service } = await setup();
      const tender = await service.createTender({ admin: 'admin', descriptorUri: 'x' });

      await service.castApprovalVote(tender.id, 'voter-1');
      const error = await errorOf(service.castApprovalVote(tender.id, 'voter-1'));

      expect(error.code).toBe(ErrorCode.DuplicateVote);
      expect(error.statusCode).toBe(409);
      const stored = service.getTender(tender.id);
      expect(stored?.yesVoteCount).toBe(1);
      expect(stored?.approvalVotes).toEqual([{ voterId: 'voter-1', votedAt: '2026-01-01T00:00:00.000Z' }]);
    });

    it('accepts a vote at the deadline and rejects one after it', async () => {
      const { service, advance } = await setup();
      const tender = await service.createTender({ admin: 'admin', descriptorUri: 'x', durationSeconds: 1000 });

      advance(1000 * 1000);
      await service.castApprovalVote(tender.id, 'voter-1');

      advance(1);
      const error = await errorOf(service.castApprovalVote(tender.id, 'voter-2'));
      expect(error.code).toBe(ErrorCode.VotingDeadlinePassed);
      expect(service.getTender(tender.id)?.yesVoteCount).toBe(1);
    });

    it('rejects votes once the tender has left voting', async () => {
      const { service } = await setup();
      const tender = await service.createTender({ admin: 'admin', descriptorUri: 'x', requiredYesVotes: 1 });
      await service.castApprovalVote(tender.id, 'voter-1');

      const error = await errorOf(service.castApprovalVote(tender.id, 'voter-2'));
      expect(error.code).toBe(ErrorCode.InvalidPhase);
      expect(error.details).toMatchObject({ phase: 'approved', requiredPhase: 'voting' });
    });

    it('reports an unknown tender', async () => {
      const { service } = await setup();
      const error = await errorOf(service.castApprovalVote('missing', 'voter-1'));
      expect(error.code).toBe(ErrorCode.TenderNotFound);
      expect(error.statusCode).toBe(404);
    });

    it('treats object property names as ordinary tender ids', async () => {
      const { service } = await setup();

      for (const tenderId of ['constructor', 'toString', '__proto__']) {
        const error = await errorOf(service.castApprovalVote(tenderId, 'voter-1'));
        expect(error.code).toBe(ErrorCode.TenderNotFound);
        expect(service.getTender(tenderId)).toBeNull();
        expect(() => service.listProposals(tenderId)).toThrow('Tender not found.');
      }
    });

    it('counts first votes from voters named like object properties', async () => {
      const { service } = await setup();
      const tender = await service.createTender({ admin: 'admin', descriptorUri: 'x', requiredYesVotes: 5 });
      const voters = ['toString', 'constructor', '__proto__', 'hasOwnProperty'];

      for (const voterId of voters) {
        await service.castApprovalVote(tender.id, voterId);
      }
      const duplicate = await errorOf(service.castApprovalVote(tender.id, '__proto__'));

      expect(duplicate.code).toBe(ErrorCode.DuplicateVote);
      const stored = service.getTender(tender.id);
      expect(stored?.yesVoteCount).toBe(4);
      expect(stored?.approvalVotes.map((vote) => vote.voterId)).toEqual(voters);
      expect(stored?.phase).toBe('voting');
    });
  });

  describe('submitProposal', () => {
    it('appends proposals with sequential ids for registered representatives', async () => {
      const { service, registry } = await setup();
      await registry.registerCompany({ id: 1, name: 'Company A', representative: 'rep-a' });
      await registry.registerCompany({ id: 2, name: 'Company B', representative: 'rep-b' });

      const tender = await service.createTender({ admin: 'admin', descriptorUri: 'x', requiredYesVotes: 1 });
      await service.castApprovalVote(tender.id, 'voter-1');
      await service.openTenderForProposals(tender.id, 'admin');

      const first = await service.submitProposal(tender.id, { companyId: 1, descriptorUri: 'ipfs://A' }, 'rep-a');
      const second = await service.submitProposal(tender.id, { companyId: 2, descriptorUri: 'ipfs://B' }, 'rep-b');

      expect(first).toMatchObject({ id: 0, companyId: 1, descriptorUri: 'ipfs://A', voteCount: 0, submittedBy: 'rep-a' });
      expect(second).toMatchObject({ id: 1, companyId: 2, descriptorUri: 'ipfs://B', voteCount: 0 });
      expect(service.listProposals(tender.id)).toHaveLength(2);
    });

    it('rejects a caller who is not the company representative', async () => {
      const { service, registry } = await setup();
      await registry.registerCompany({ id: 1, name: 'Company A', representative: 'rep-a' });
      const tender = await service.createTender({ admin: 'admin', descriptorUri: 'x', requiredYesVotes: 1 });
      await service.castApprovalVote(tender.id, 'voter-1');
      await service.openTenderForProposals(tender.id, 'admin');

      const error = await errorOf(
        service.submitProposal(tender.id, { companyId: 1, descriptorUri: 'ipfs://A' }, 'impostor'),
      );

      expect(error.code).toBe(ErrorCode.UnauthorizedCaller);
      expect(error.statusCode).toBe(403);
      expect(service.listProposals(tender.id)).toEqual([]);
    });

    it('reports a company missing from the directory', async () => {
      const { service } = await setup();
      const tender = await service.createTender({ admin: 'admin', descriptorUri: 'x', requiredYesVotes: 1 });
      await service.castApprovalVote(tender.id, 'voter-1');
      await service.openTenderForProposals(tender.id, 'admin');

      const error = await errorOf(service.submitProposal(tender.id, { companyId: 9, descriptorUri: 'u' }, 'rep-a'));
      expect(error.code).toBe(ErrorCode.CompanyNotFound);
    });

    it('maps a failing directory to a dependency failure', async () => {
      const fake = fakeCollaborators({ 1: 'rep-a' });
      fake.lookupCompany.mockRejectedValueOnce(new Error('directory offline'));
      const { service } = await setup({ collaborators: fake.suite });
      const tender = await service.createTender({ admin: 'admin', descriptorUri: 'x', requiredYesVotes: 1 });
      await service.castApprovalVote(tender.id, 'voter-1');
      await service.openTenderForProposals(tender.id, 'admin');

      const error = await errorOf(service.submitProposal(tender.id, { companyId: 1, descriptorUri: 'u' }, 'rep-a'));
      expect(error.code).toBe(ErrorCode.DependencyFailure);
      expect(error.details).toMatchObject({ operation: 'lookupCompany' });
    });

    it('is only open while proposing', async () => {
      const fake = fakeCollaborators({ 1: 'rep-a' });
      const { service } = await setup({ collaborators: fake.suite });
      const tender = await service.createTender({ admin: 'admin', descriptorUri: 'x' });

      const error = await errorOf(service.submitProposal(tender.id, { companyId: 1, descriptorUri: 'u' }, 'rep-a'));
      expect(error.code).toBe(ErrorCode.InvalidPhase);
      expect(fake.lookupCompany).not.toHaveBeenCalled();
    });
  });

  describe('voteForProposal', () => {
    it('lets one voter back several proposals but each only once', async () => {
      const fake = fakeCollaborators({ 1: 'rep-a', 2: 'rep-b' });
      const { service } = await setup({ collaborators: fake.suite });
      const tender = await tenderInProposalVoting(service);

      await service.voteForProposal(tender.id, 0, 'voter-1');
      const after = await service.voteForProposal(tender.id, 1, 'voter-1');
      expect(after.proposalVotes.filter((ballot) => ballot.voterId === 'voter-1').map((ballot) => ballot.proposalId))
        .toEqual([0, 1]);

      const error = await errorOf(service.voteForProposal(tender.id, 1, 'voter-1'));
      expect(error.code).toBe(ErrorCode.DuplicateVote);
      expect(service.getProposal(tender.id, 1)?.voteCount).toBe(1);
    });

    it('accepts proposal votes from voters named like object properties', async () => {
      const fake = fakeCollaborators({ 1: 'rep-a', 2: 'rep-b' });
      const { service } = await setup({ collaborators: fake.suite });
      const tender = await tenderInProposalVoting(service);

      await service.voteForProposal(tender.id, 0, 'constructor');
      const after = await service.voteForProposal(tender.id, 0, 'hasOwnProperty');
      const duplicate = await errorOf(service.voteForProposal(tender.id, 0, 'constructor'));

      expect(after.proposals[0]?.voteCount).toBe(2);
      expect(duplicate.code).toBe(ErrorCode.DuplicateVote);
    });

    it('reports a proposal id out of range', async () => {
      const fake = fakeCollaborators({ 1: 'rep-a', 2: 'rep-b' });
      const { service } = await setup({ collaborators: fake.suite });
      const tender = await tenderInProposalVoting(service);

      const error = await errorOf(service.voteForProposal(tender.id, 2, 'voter-1'));
      expect(error.code).toBe(ErrorCode.ProposalNotFound);
    });

    it('replaces the leader only on a strictly greater count', async () => {
      const fake = fakeCollaborators({ 1: 'rep-a', 2: 'rep-b' });
      const { service } = await setup({ collaborators: fake.suite });
      const tender = await tenderInProposalVoting(service);

      let state = await service.voteForProposal(tender.id, 1, 'voter-1');
      expect(state.currentWinningProposalIndex).toBe(1);

      state = await service.voteForProposal(tender.id, 0, 'voter-2');
      expect(state.proposals.map((p) => p.voteCount)).toEqual([1, 1]);
      expect(state.currentWinningProposalIndex).toBe(1);

      state = await service.voteForProposal(tender.id, 0, 'voter-3');
      expect(state.currentWinningProposalIndex).toBe(0);
    });

    it('keeps the leader at a maximal count across a vote sequence', async () => {
      const fake = fakeCollaborators({ 1: 'rep-a', 2: 'rep-b', 3: 'rep-c' });
      const { service } = await setup({ collaborators: fake.suite });
      const tender = await service.createTender({ admin: 'admin', descriptorUri: 'x', requiredYesVotes: 1 });
      await service.castApprovalVote(tender.id, 'voter-1');
      await service.openTenderForProposals(tender.id, 'admin');
      await service.submitProposal(tender.id, { companyId: 1, descriptorUri: 'a' }, 'rep-a');
      await service.submitProposal(tender.id, { companyId: 2, descriptorUri: 'b' }, 'rep-b');
      await service.submitProposal(tender.id, { companyId: 3, descriptorUri: 'c' }, 'rep-c');
      await service.closeProposingAndOpenVoting(tender.id, 'admin');

      const ballots: Array<[number, string]> = [
        [2, 'v1'], [1, 'v1'], [1, 'v2'], [0, 'v1'], [2, 'v2'], [0, 'v2'], [0, 'v3'], [2, 'v3'], [2, 'v4'],
      ];
      for (const [proposalId, voter] of ballots) {
        const state = await service.voteForProposal(tender.id, proposalId, voter);
        const leader = state.proposals[state.currentWinningProposalIndex];
        const max = Math.max(...state.proposals.map((p) => p.voteCount));
        expect(leader?.voteCount).toBe(max);
      }

      expect(service.getTender(tender.id)?.currentWinningProposalIndex).toBe(2);
    });
  });

  describe('admin operations', () => {
    it('requires the admin identity', async () => {
      const { service } = await setup();
      const tender = await service.createTender({ admin: 'admin', descriptorUri: 'x' });

      const attempts: Array<() => Promise<unknown>> = [
        () => service.overrideAndApprove(tender.id, 'voter-1'),
        () => service.overrideAndDecline(tender.id, 'voter-1'),
        () => service.openTenderForProposals(tender.id, 'voter-1'),
        () => service.closeProposingAndOpenVoting(tender.id, 'voter-1'),
        () => service.closeProposalVoting(tender.id, 'voter-1'),
        () => service.awardProposal(tender.id, 100, 'voter-1'),
        () => service.updateAdmin(tender.id, 'voter-1', 'voter-1'),
      ];
      for (const attempt of attempts) {
        const error = await errorOf(attempt());
        expect(error.code).toBe(ErrorCode.UnauthorizedCaller);
      }
      expect(service.getTender(tender.id)?.phase).toBe('voting');
      expect(service.getTender(tender.id)?.admin).toBe('admin');
    });

    it('moves around the approval triangle only through overrides', async () => {
      const { service } = await setup();
      const tender = await service.createTender({ admin: 'admin', descriptorUri: 'x' });

      expect((await service.overrideAndDecline(tender.id, 'admin')).phase).toBe('declined');
      expect((await service.overrideAndApprove(tender.id, 'admin')).phase).toBe('approved');
      expect((await service.overrideAndDecline(tender.id, 'admin')).phase).toBe('declined');

      const twice = await errorOf(service.overrideAndDecline(tender.id, 'admin'));
      expect(twice.code).toBe(ErrorCode.InvalidPhase);

      const fromDeclined = await errorOf(service.openTenderForProposals(tender.id, 'admin'));
      expect(fromDeclined.code).toBe(ErrorCode.InvalidPhase);
    });

    it('cannot override once proposing has begun', async () => {
      const { service } = await setup();
      const tender = await service.createTender({ admin: 'admin', descriptorUri: 'x', requiredYesVotes: 1 });
      await service.castApprovalVote(tender.id, 'voter-1');
      await service.openTenderForProposals(tender.id, 'admin');

      expect((await errorOf(service.overrideAndApprove(tender.id, 'admin'))).code).toBe(ErrorCode.InvalidPhase);
      expect((await errorOf(service.overrideAndDecline(tender.id, 'admin'))).code).toBe(ErrorCode.InvalidPhase);
    });

    it('requires at least one proposal before proposal voting opens', async () => {
      const { service } = await setup();
      const tender = await service.createTender({ admin: 'admin', descriptorUri: 'x', requiredYesVotes: 1 });
      await service.castApprovalVote(tender.id, 'voter-1');
      await service.openTenderForProposals(tender.id, 'admin');

      const error = await errorOf(service.closeProposingAndOpenVoting(tender.id, 'admin'));
      expect(error.code).toBe(ErrorCode.InvalidPhase);
      expect(error.details).toMatchObject({ proposals: 0 });
      expect(service.getTender(tender.id)?.phase).toBe('proposing');
    });

    it('transfers override authority in one step', async () => {
      const { service } = await setup();
      const tender = await service.createTender({ admin: 'admin', descriptorUri: 'x' });

      const updated = await service.updateAdmin(tender.id, 'admin-2', 'admin');
      expect(updated.admin).toBe('admin-2');

      expect((await errorOf(service.overrideAndDecline(tender.id, 'admin'))).code).toBe(ErrorCode.UnauthorizedCaller);
      expect((await service.overrideAndDecline(tender.id, 'admin-2')).phase).toBe('declined');
    });

    it('refuses to award before proposal voting has closed', async () => {
      const fake = fakeCollaborators({ 1: 'rep-a', 2: 'rep-b' });
      const { service } = await setup({ collaborators: fake.suite });
      const tender = await tenderInProposalVoting(service);

      const error = await errorOf(service.awardProposal(tender.id, 5000, 'admin'));
      expect(error.code).toBe(ErrorCode.InvalidPhase);
      expect(fake.createProject).not.toHaveBeenCalled();
      expect(fake.disburse).not.toHaveBeenCalled();
    });
  });

  describe('awardProposal', () => {
    it('runs the full tender lifecycle', async () => {
      const fake = fakeCollaborators({ 1: 'rep-a', 2: 'rep-b' });
      const { service } = await setup({ collaborators: fake.suite });
      const tender = await service.createTender({
        admin: 'admin',
        descriptorUri: 'ipfs://tender',
        durationSeconds: 1000,
        requiredYesVotes: 2,
      });

      await service.castApprovalVote(tender.id, 'voter-1');
      expect((await service.castApprovalVote(tender.id, 'voter-2')).phase).toBe('approved');
      expect((await service.openTenderForProposals(tender.id, 'admin')).phase).toBe('proposing');

      await service.submitProposal(tender.id, { companyId: 1, descriptorUri: 'ipfs://A' }, 'rep-a');
      await service.submitProposal(tender.id, { companyId: 2, descriptorUri: 'ipfs://B' }, 'rep-b');
      expect((await service.closeProposingAndOpenVoting(tender.id, 'admin')).phase).toBe('proposal_voting');

      await service.voteForProposal(tender.id, 1, 'voter-1');
      await service.voteForProposal(tender.id, 1, 'voter-2');
      await service.voteForProposal(tender.id, 1, 'voter-3');
      const afterVotes = await service.voteForProposal(tender.id, 0, 'voter-4');
      expect(afterVotes.currentWinningProposalIndex).toBe(1);

      expect((await service.closeProposalVoting(tender.id, 'admin')).phase).toBe('voting_closed');

      const awarded = await service.awardProposal(tender.id, 5000, 'admin');
      expect(awarded.tender.phase).toBe('awarded');
      expect(awarded.tender.winningProposalIndex).toBe(1);
      expect(awarded.tender.awardedProjectRef).toBe('project-1');
      expect(awarded.tender.fundingAmount).toBe(5000);
      expect(awarded.projectId).toBe('project-1');
      expect(awarded.proposal.companyId).toBe(2);
      expect(fake.createProject).toHaveBeenCalledWith(tender.id, 2);
      expect(fake.disburse).toHaveBeenCalledWith(5000, 'project-1');

      expect(awarded.tender.phaseHistory.map((change) => change.to)).toEqual([
        'approved',
        'proposing',
        'proposal_voting',
        'voting_closed',
        'awarded',
      ]);

      const again = await errorOf(service.awardProposal(tender.id, 5000, 'admin'));
      expect(again.code).toBe(ErrorCode.InvalidPhase);
    });

    it('records the project and disbursement in the local collaborators', async () => {
      const { service, registry, store } = await setup({ initialBalance: 10_000 });
      await registry.registerCompany({ id: 1, name: 'Company A', representative: 'rep-a' });
      await registry.registerCompany({ id: 2, name: 'Company B', representative: 'rep-b' });
      const tender = await tenderInProposalVoting(service);
      await service.voteForProposal(tender.id, 0, 'voter-1');
      await service.closeProposalVoting(tender.id, 'admin');

      const { projectId } = await service.awardProposal(tender.id, 5000, 'admin');

      const state = store.snapshot();
      expect(state.projects[projectId]).toMatchObject({
        tenderId: tender.id,
        companyId: 1,
        fundedAmount: 5000,
        createdAt: '2026-01-01T00:00:00.000Z',
      });
      expect(state.ledger.balance).toBe(5000);
      expect(state.ledger.disbursements).toHaveLength(1);
      expect(state.ledger.disbursements[0]).toMatchObject({ projectId, amount: 5000, createdAt: '2026-01-01T00:00:00.000Z' });
      expect(state.metrics.awards).toBe(1);
    });

    it('leaves no trace when the ledger cannot fund the award', async () => {
      const { service, registry, store } = await setup({ initialBalance: 100 });
      await registry.registerCompany({ id: 1, name: 'Company A', representative: 'rep-a' });
      await registry.registerCompany({ id: 2, name: 'Company B', representative: 'rep-b' });
      const tender = await tenderInProposalVoting(service);
      await service.closeProposalVoting(tender.id, 'admin');

      const error = await errorOf(service.awardProposal(tender.id, 5000, 'admin'));

      expect(error.code).toBe(ErrorCode.DependencyFailure);
      expect(error.details).toMatchObject({ operation: 'disburse', requested: 5000, balance: 100 });
      const state = store.snapshot();
      const stored = state.tenders[tender.id];
      expect(stored?.phase).toBe('voting_closed');
      expect(stored?.winningProposalIndex).toBeNull();
      expect(stored?.awardedProjectRef).toBeNull();
      expect(Object.keys(state.projects)).toEqual([]);
      expect(state.ledger.balance).toBe(100);
      expect(state.ledger.disbursements).toEqual([]);
    });

    it('keeps the tender unchanged when project creation fails', async () => {
      const fake = fakeCollaborators({ 1: 'rep-a', 2: 'rep-b' });
      fake.createProject.mockRejectedValueOnce(new CollaboratorRejectedError('createProject', 'factory paused'));
      const { service } = await setup({ collaborators: fake.suite });
      const tender = await tenderInProposalVoting(service);
      await service.closeProposalVoting(tender.id, 'admin');

      const error = await errorOf(service.awardProposal(tender.id, 5000, 'admin'));

      expect(error.code).toBe(ErrorCode.DependencyFailure);
      expect(error.message).toBe('createProject was rejected: factory paused');
      expect(fake.disburse).not.toHaveBeenCalled();
      expect(service.getTender(tender.id)?.phase).toBe('voting_closed');
    });

    it('emits the award only after it commits', async () => {
      const fake = fakeCollaborators({ 1: 'rep-a', 2: 'rep-b' });
      fake.disburse.mockRejectedValueOnce(new Error('ledger offline'));
      const { service } = await setup({ collaborators: fake.suite });
      const tender = await tenderInProposalVoting(service);
      await service.closeProposalVoting(tender.id, 'admin');

      const awards: unknown[] = [];
      eventBus.on('tender.awarded', (_event, data) => awards.push(data));

      await errorOf(service.awardProposal(tender.id, 5000, 'admin'));
      expect(awards).toEqual([]);
      expect(service.getTender(tender.id)?.phase).toBe('voting_closed');

      await service.awardProposal(tender.id, 5000, 'admin');
      expect(awards).toEqual([{ tenderId: tender.id, winningProposalIndex: 0, projectId: 'project-1', fundingAmount: 5000 }]);
    });
  });

  describe('event log', () => {
    it('keeps a committed operation when the log append fails', async () => {
      class FailingLogger extends EventLogger {
        async log(): Promise<void> {
          throw new Error('disk full');
        }
      }
      const consoleError = vi.spyOn(console, 'error').mockImplementation(() => {});
      const { service } = await setup({ logger: new FailingLogger(path.join(dir, 'events.ndjson')) });
      const changes: unknown[] = [];
      eventBus.on('tender.phase_changed', (_event, data) => changes.push(data));

      const tender = await service.createTender({ admin: 'admin', descriptorUri: 'x', requiredYesVotes: 1 });
      const approved = await service.castApprovalVote(tender.id, 'voter-1');

      expect(approved.phase).toBe('approved');
      expect(service.getTender(tender.id)?.phase).toBe('approved');
      expect(changes).toEqual([{ tenderId: tender.id, from: 'voting', to: 'approved', operation: 'approval_vote' }]);
      expect(consoleError.mock.calls.map((call) => call[0])).toEqual([
        'event log append failed for tender.created',
        'event log append failed for tender.approval_vote',
      ]);
      consoleError.mockRestore();
    });
  });

  describe('phase history', () => {
    it('stamps phase changes with the service clock', async () => {
      const { service, advance } = await setup();
      const tender = await service.createTender({ admin: 'admin', descriptorUri: 'x', requiredYesVotes: 1 });

      advance(5000);
      const approved = await service.castApprovalVote(tender.id, 'voter-1');

      expect(approved.phaseHistory).toEqual([
        { from: 'voting', to: 'approved', action: 'approvalThresholdReached', at: '2026-01-01T00:00:05.000Z' },
      ]);
      expect(approved.updatedAt).toBe('2026-01-01T00:00:05.000Z');
      expect(approved.approvalVotes[0]?.votedAt).toBe('2026-01-01T00:00:05.000Z');
    });

    it('only ever walks the transition table under arbitrary operation sequences', async () => {
      const fake = fakeCollaborators({ 1: 'rep-a', 2: 'rep-b' });
      const { service } = await setup({ collaborators: fake.suite });
      const voters = ['v1', 'v2', 'v3'];
      const callers = ['admin', 'v1'];

      let seed = 7;
      const pick = (n: number): number => {
        seed = (seed * 48271) % 2147483647;
        return seed % n;
      };

      for (let round = 0; round < 5; round++) {
        const tender = await service.createTender({ admin: 'admin', descriptorUri: `t${round}`, requiredYesVotes: 2 });
        const operations: Array<() => Promise<unknown>> = [
          () => service.castApprovalVote(tender.id, voters[pick(3)] ?? 'v1'),
          () => service.overrideAndApprove(tender.id, callers[pick(2)] ?? 'admin'),
          () => service.overrideAndDecline(tender.id, callers[pick(2)] ?? 'admin'),
          () => service.openTenderForProposals(tender.id, 'admin'),
          () => service.submitProposal(tender.id, { companyId: 1 + pick(2), descriptorUri: 'u' }, pick(2) ? 'rep-a' : 'rep-b'),
          () => service.closeProposingAndOpenVoting(tender.id, 'admin'),
          () => service.voteForProposal(tender.id, pick(3), voters[pick(3)] ?? 'v1'),
          () => service.closeProposalVoting(tender.id, 'admin'),
          () => service.awardProposal(tender.id, 10, callers[pick(2)] ?? 'admin'),
        ];

        for (let step = 0; step < 60; step++) {
          const operation = operations[pick(operations.length)];
          if (!operation) continue;
          await operation().catch((error: unknown) => {
            expect(error).toBeInstanceOf(DomainError);
          });
        }

        const history = service.getTender(tender.id)?.phaseHistory ?? [];
        let phase = 'voting';
        for (const change of history) {
          expect(change.from).toBe(phase);
          expect(nextPhase(change.from, change.action)).toBe(change.to);
          expect(Object.keys(TRANSITIONS[change.action])).toContain(change.from);
          phase = change.to;
        }
        expect(service.getTender(tender.id)?.phase).toBe(phase);
      }
    });
  });
});
