/**
 * Tender lifecycle service.
 *
 * Voters approve a tender, registered companies bid on it, voters pick a
 * proposal, and the tender admin awards it. The admin can also force the
 * approval outcome either way while the tender has not moved past it.
 *
 * Every operation runs in a single store transaction: guards, vote
 * bookkeeping, phase changes and local collaborator writes commit together
 * or not at all.
 */

import { v4 as uuid } from 'uuid';
import { applyTransition, assertTransition, requirePhase } from '../domain/tender/phaseMachine.js';
import type { Proposal, Tender, TenderPhase } from '../domain/tender/tenderTypes.js';
import { nextLeader } from '../domain/tender/winnerTracking.js';
import {
  DomainError,
  ErrorCode,
  duplicateVoteError,
  phaseError,
  unauthorizedError,
} from '../errors/taxonomy.js';
import { eventBus } from '../infra/eventBus.js';
import { EventLogger } from '../infra/logger.js';
import type { LogLevel } from '../infra/logger.js';
import { StateStore } from '../infra/storage/stateStore.js';
import { mapCollaboratorError } from '../integrations/collaborators/errorMapping.js';
import type { CollaboratorOperation } from '../integrations/collaborators/errorMapping.js';
import type { CollaboratorSuite } from '../integrations/collaborators/types.js';
import type { AppState } from '../types.js';
import { ownValue } from '../utils/records.js';

export interface TenderServiceOptions {
  defaultDurationSeconds: number;
  defaultRequiredYesVotes: number;
  minProposalsToVote: number;
  /** Milliseconds since epoch; used for creation times and the voting deadline. */
  now?: () => number;
}

export interface CreateTenderInput {
  admin: string;
  descriptorUri: string;
  durationSeconds?: number;
  requiredYesVotes?: number;
}

export interface SubmitProposalInput {
  companyId: number;
  descriptorUri: string;
}

export interface AwardResult {
  tender: Tender;
  proposal: Proposal;
  projectId: string;
}

interface Outcome<T> {
  tender: Tender;
  result: T;
  phaseBefore: TenderPhase;
}

/** Longest approval window a tender may ask for: ten years. */
export const MAX_TENDER_DURATION_SECONDS = 10 * 365 * 24 * 60 * 60;

const invalidPayload = (message: string, details?: Record<string, unknown>): DomainError => (
  new DomainError(ErrorCode.InvalidPayload, 400, message, details)
);

export class TenderService {
  private readonly now: () => number;

  constructor(
    private readonly store: StateStore,
    private readonly logger: EventLogger,
    private readonly collaborators: CollaboratorSuite,
    private readonly options: TenderServiceOptions,
  ) {
    this.now = options.now ?? Date.now;
  }

  async createTender(input: CreateTenderInput): Promise<Tender> {
    const admin = input.admin.trim();
    if (!admin) throw invalidPayload('admin identity is required.');

    const durationSeconds = input.durationSeconds ?? this.options.defaultDurationSeconds;
    if (!Number.isFinite(durationSeconds) || durationSeconds <= 0 || durationSeconds > MAX_TENDER_DURATION_SECONDS) {
      throw invalidPayload(`durationSeconds must be between 1 and ${MAX_TENDER_DURATION_SECONDS}.`, { durationSeconds });
    }

    const requiredYesVotes = input.requiredYesVotes ?? this.options.defaultRequiredYesVotes;
    if (!Number.isInteger(requiredYesVotes) || requiredYesVotes < 1) {
      throw invalidPayload('requiredYesVotes must be a positive integer.', { requiredYesVotes });
    }

    const startedAt = this.now();
    const deadline = new Date(startedAt + durationSeconds * 1000);
    if (Number.isNaN(deadline.getTime())) {
      throw invalidPayload('durationSeconds puts the voting deadline out of range.', { durationSeconds });
    }
    const createdAt = new Date(startedAt).toISOString();
    const tender: Tender = {
      id: uuid(),
      phase: 'voting',
      admin,
      descriptorUri: input.descriptorUri,
      companyDirectoryRef: this.collaborators.refs.companyDirectory,
      fundingLedgerRef: this.collaborators.refs.fundingLedger,
      createdAt,
      updatedAt: createdAt,
      votingDeadline: deadline.toISOString(),
      requiredYesVotes,
      yesVoteCount: 0,
      approvalVotes: [],
      proposals: [],
      proposalVotes: [],
      currentWinningProposalIndex: 0,
      winningProposalIndex: null,
      awardedProjectRef: null,
      fundingAmount: null,
      phaseHistory: [],
    };

    await this.store.transaction((state) => {
      state.tenders[tender.id] = tender;
      state.metrics.tendersCreated += 1;
      return undefined;
    });

    await this.record('info', 'tender.created', {
      tenderId: tender.id,
      admin,
      requiredYesVotes,
      votingDeadline: tender.votingDeadline,
    });
    eventBus.emit('tender.created', structuredClone(tender));
    return structuredClone(tender);
  }

  // ─── Voters ─────────────────────────────────────────────────────────

  /**
   * Record a yes-vote. Reaching the threshold approves the tender in the
   * same call.
   */
  async castApprovalVote(tenderId: string, voterId: string): Promise<Tender> {
    const { tender } = await this.mutate(tenderId, 'approval_vote', voterId, (draft, state) => {
      requirePhase(draft, 'voting', 'cast an approval vote');

      if (this.now() > Date.parse(draft.votingDeadline)) {
        throw new DomainError(
          ErrorCode.VotingDeadlinePassed,
          409,
          'Approval voting deadline has passed.',
          { tenderId, votingDeadline: draft.votingDeadline },
        );
      }

      if (draft.approvalVotes.some((vote) => vote.voterId === voterId)) {
        throw duplicateVoteError('Voter has already cast an approval vote.', { tenderId, voterId });
      }

      draft.approvalVotes.push({ voterId, votedAt: this.timestamp() });
      draft.yesVoteCount = draft.approvalVotes.length;
      state.metrics.approvalVotes += 1;

      if (draft.yesVoteCount >= draft.requiredYesVotes) {
        applyTransition(draft, 'approvalThresholdReached', this.timestamp());
      }
      return undefined;
    });

    eventBus.emit('tender.approval_voted', {
      tenderId,
      voterId,
      yesVoteCount: tender.yesVoteCount,
      requiredYesVotes: tender.requiredYesVotes,
    });
    return tender;
  }

  async voteForProposal(tenderId: string, proposalId: number, voterId: string): Promise<Tender> {
    const { tender, result } = await this.mutate(tenderId, 'proposal_vote', voterId, (draft, state) => {
      requirePhase(draft, 'proposal_voting', 'vote for a proposal');

      const proposal = draft.proposals[proposalId];
      if (!Number.isInteger(proposalId) || !proposal) {
        throw new DomainError(ErrorCode.ProposalNotFound, 404, 'Proposal not found.', { tenderId, proposalId });
      }

      const already = draft.proposalVotes.some((ballot) => ballot.voterId === voterId && ballot.proposalId === proposalId);
      if (already) {
        throw duplicateVoteError('Voter has already voted for this proposal.', { tenderId, voterId, proposalId });
      }

      draft.proposalVotes.push({ voterId, proposalId, votedAt: this.timestamp() });
      proposal.voteCount += 1;
      draft.currentWinningProposalIndex = nextLeader(draft.proposals, draft.currentWinningProposalIndex, proposal);
      state.metrics.proposalVotes += 1;
      return proposal.voteCount;
    });

    eventBus.emit('proposal.voted', {
      tenderId,
      proposalId,
      voterId,
      voteCount: result,
      currentWinningProposalIndex: tender.currentWinningProposalIndex,
    });
    return tender;
  }

  // ─── Companies ──────────────────────────────────────────────────────

  async submitProposal(tenderId: string, input: SubmitProposalInput, callerId: string): Promise<Proposal> {
    if (!Number.isInteger(input.companyId) || input.companyId < 0) {
      throw invalidPayload('companyId must be a non-negative integer.', { companyId: input.companyId });
    }

    const { result } = await this.mutate(tenderId, 'proposal_submit', callerId, async (draft, state) => {
      requirePhase(draft, 'proposing', 'submit a proposal');

      const { companyDirectory } = this.collaborators.bind(state, () => this.timestamp());
      const representative = await this.invoke('lookupCompany', () => companyDirectory.lookupCompany(input.companyId));
      if (representative !== callerId) {
        throw unauthorizedError('Caller is not the registered representative of this company.', {
          tenderId,
          companyId: input.companyId,
        });
      }

      const proposal: Proposal = {
        id: draft.proposals.length,
        companyId: input.companyId,
        descriptorUri: input.descriptorUri,
        voteCount: 0,
        submittedBy: callerId,
        submittedAt: this.timestamp(),
      };
      draft.proposals.push(proposal);
      state.metrics.proposalsSubmitted += 1;
      return structuredClone(proposal);
    });

    eventBus.emit('proposal.submitted', { tenderId, ...result });
    return result;
  }

  // ─── Admin ──────────────────────────────────────────────────────────

  async overrideAndApprove(tenderId: string, callerId: string): Promise<Tender> {
    const { tender } = await this.mutate(tenderId, 'override_approve', callerId, (draft, state) => {
      this.requireAdmin(draft, callerId, 'override the approval vote');
      applyTransition(draft, 'overrideApprove', this.timestamp());
      state.metrics.overrides += 1;
      return undefined;
    });
    return tender;
  }

  async overrideAndDecline(tenderId: string, callerId: string): Promise<Tender> {
    const { tender } = await this.mutate(tenderId, 'override_decline', callerId, (draft, state) => {
      this.requireAdmin(draft, callerId, 'decline the tender');
      applyTransition(draft, 'overrideDecline', this.timestamp());
      state.metrics.overrides += 1;
      return undefined;
    });
    return tender;
  }

  async openTenderForProposals(tenderId: string, callerId: string): Promise<Tender> {
    const { tender } = await this.mutate(tenderId, 'open_proposals', callerId, (draft) => {
      this.requireAdmin(draft, callerId, 'open the tender for proposals');
      applyTransition(draft, 'openProposing', this.timestamp());
      return undefined;
    });
    return tender;
  }

  async closeProposingAndOpenVoting(tenderId: string, callerId: string): Promise<Tender> {
    const { tender } = await this.mutate(tenderId, 'close_proposals', callerId, (draft) => {
      this.requireAdmin(draft, callerId, 'close proposing');
      assertTransition(draft, 'closeProposing');

      if (draft.proposals.length < this.options.minProposalsToVote) {
        throw phaseError(
          `At least ${this.options.minProposalsToVote} proposal(s) are required before proposal voting opens.`,
          { tenderId, proposals: draft.proposals.length },
        );
      }

      applyTransition(draft, 'closeProposing', this.timestamp());
      draft.currentWinningProposalIndex = 0;
      return undefined;
    });
    return tender;
  }

  async closeProposalVoting(tenderId: string, callerId: string): Promise<Tender> {
    const { tender } = await this.mutate(tenderId, 'close_proposal_voting', callerId, (draft) => {
      this.requireAdmin(draft, callerId, 'close proposal voting');
      applyTransition(draft, 'closeProposalVoting', this.timestamp());
      return undefined;
    });
    return tender;
  }

  /**
   * Award the leading proposal: create its project, mark the tender
   * awarded and disburse the funding to the new project. A failure at any
   * step leaves the tender as it was.
   */
  async awardProposal(tenderId: string, fundingAmount: number, callerId: string): Promise<AwardResult> {
    if (!Number.isFinite(fundingAmount) || fundingAmount < 0) {
      throw invalidPayload('fundingAmount must be a non-negative number.', { fundingAmount });
    }

    const { tender, result } = await this.mutate(tenderId, 'award', callerId, async (draft, state) => {
      this.requireAdmin(draft, callerId, 'award the tender');
      assertTransition(draft, 'award');

      const proposal = draft.proposals[draft.currentWinningProposalIndex];
      if (!proposal) {
        throw new DomainError(ErrorCode.ProposalNotFound, 404, 'Tender has no winning proposal.', {
          tenderId,
          currentWinningProposalIndex: draft.currentWinningProposalIndex,
        });
      }

      const { projectFactory, fundingLedger } = this.collaborators.bind(state, () => this.timestamp());
      const projectId = await this.invoke('createProject', () => projectFactory.createProject(draft.id, proposal.companyId));

      draft.winningProposalIndex = proposal.id;
      draft.awardedProjectRef = projectId;
      draft.fundingAmount = fundingAmount;
      applyTransition(draft, 'award', this.timestamp());

      await this.invoke('disburse', () => fundingLedger.disburse(fundingAmount, projectId));
      state.metrics.awards += 1;
      return { proposal: structuredClone(proposal), projectId };
    });

    eventBus.emit('tender.awarded', {
      tenderId,
      winningProposalIndex: tender.winningProposalIndex,
      projectId: result.projectId,
      fundingAmount,
    });
    return { tender, ...result };
  }

  /** Hand override authority to `newAdmin` in one step. */
  async updateAdmin(tenderId: string, newAdmin: string, callerId: string): Promise<Tender> {
    const next = newAdmin.trim();
    if (!next) throw invalidPayload('newAdmin identity is required.');

    const { tender, result: previous } = await this.mutate(tenderId, 'admin_update', callerId, (draft) => {
      this.requireAdmin(draft, callerId, 'update the admin');
      const prior = draft.admin;
      draft.admin = next;
      return prior;
    });

    eventBus.emit('tender.admin_updated', { tenderId, previousAdmin: previous, admin: tender.admin });
    return tender;
  }

  // ─── Reads ──────────────────────────────────────────────────────────

  getTender(tenderId: string): Tender | null {
    return ownValue(this.store.snapshot().tenders, tenderId) ?? null;
  }

  listTenders(phaseFilter?: TenderPhase): Tender[] {
    const tenders = Object.values(this.store.snapshot().tenders);
    const filtered = phaseFilter ? tenders.filter((t) => t.phase === phaseFilter) : tenders;
    return filtered.sort((a, b) => b.createdAt.localeCompare(a.createdAt));
  }

  listProposals(tenderId: string): Proposal[] {
    return this.requireTender(tenderId).proposals;
  }

  getProposal(tenderId: string, proposalId: number): Proposal | null {
    return this.requireTender(tenderId).proposals[proposalId] ?? null;
  }

  // ─── Internals ──────────────────────────────────────────────────────

  private requireTender(tenderId: string): Tender {
    const tender = this.getTender(tenderId);
    if (!tender) {
      throw new DomainError(ErrorCode.TenderNotFound, 404, 'Tender not found.', { tenderId });
    }
    return tender;
  }

  private requireAdmin(tender: Tender, callerId: string, operation: string): void {
    if (tender.admin !== callerId) {
      throw unauthorizedError(`Only the tender admin may ${operation}.`, { tenderId: tender.id });
    }
  }

  private timestamp(): string {
    return new Date(this.now()).toISOString();
  }

  /** Append to the event log. A failed append goes to stderr and does not fail the operation. */
  private async record(level: LogLevel, event: string, data: Record<string, unknown>): Promise<void> {
    try {
      await this.logger.log(level, event, data);
    } catch (error) {
      console.error(`event log append failed for ${event}`, error);
    }
  }

  private async invoke<T>(operation: CollaboratorOperation, call: () => Promise<T>): Promise<T> {
    try {
      return await call();
    } catch (error) {
      throw mapCollaboratorError(error, operation);
    }
  }

  private async mutate<T>(
    tenderId: string,
    operation: string,
    callerId: string,
    work: (tender: Tender, state: AppState) => Promise<T> | T,
  ): Promise<Outcome<T>> {
    let outcome: Outcome<T>;
    try {
      outcome = await this.store.transaction(async (state) => {
        const tender = ownValue(state.tenders, tenderId);
        if (!tender) {
          throw new DomainError(ErrorCode.TenderNotFound, 404, 'Tender not found.', { tenderId });
        }

        const phaseBefore = tender.phase;
        const result = await work(tender, state);
        tender.updatedAt = this.timestamp();
        return { tender: structuredClone(tender), result, phaseBefore };
      });
    } catch (error) {
      await this.record('warn', `tender.${operation}.rejected`, {
        tenderId,
        callerId,
        code: error instanceof DomainError ? error.code : ErrorCode.InternalError,
        message: error instanceof Error ? error.message : String(error),
      });
      throw error;
    }

    await this.record('info', `tender.${operation}`, {
      tenderId,
      callerId,
      phase: outcome.tender.phase,
    });

    if (outcome.phaseBefore !== outcome.tender.phase) {
      eventBus.emit('tender.phase_changed', {
        tenderId,
        from: outcome.phaseBefore,
        to: outcome.tender.phase,
        operation,
      });
    }

    return outcome;
  }
}
