import { phaseError } from '../../errors/taxonomy.js';
import type { Tender, TenderAction, TenderPhase } from './tenderTypes.js';

type TransitionTable = {
  [A in TenderAction]: Partial<Record<TenderPhase, TenderPhase>>;
};

/**
 * Every legal phase change. A (phase, action) pair missing here is rejected.
 * The voting/approved/declined triangle is only reachable through overrides.
 */
export const TRANSITIONS = {
  approvalThresholdReached: { voting: 'approved' },
  overrideApprove: { voting: 'approved', declined: 'approved' },
  overrideDecline: { voting: 'declined', approved: 'declined' },
  openProposing: { approved: 'proposing' },
  closeProposing: { proposing: 'proposal_voting' },
  closeProposalVoting: { proposal_voting: 'voting_closed' },
  award: { voting_closed: 'awarded' },
} as const satisfies TransitionTable;

export const nextPhase = (phase: TenderPhase, action: TenderAction): TenderPhase | null => {
  const edges: Partial<Record<TenderPhase, TenderPhase>> = TRANSITIONS[action];
  return edges[phase] ?? null;
};

export const allowedFrom = (action: TenderAction): TenderPhase[] => (
  Object.keys(TRANSITIONS[action]).filter(isTenderPhase)
);

const PHASES: readonly TenderPhase[] = [
  'voting',
  'approved',
  'declined',
  'proposing',
  'proposal_voting',
  'voting_closed',
  'awarded',
];

export const isTenderPhase = (value: string): value is TenderPhase => (
  PHASES.some((phase) => phase === value)
);

/** Target phase of `action`, or an invalid_phase error when the edge does not exist. */
export const assertTransition = (tender: Tender, action: TenderAction): TenderPhase => {
  const to = nextPhase(tender.phase, action);
  if (!to) {
    throw phaseError(`Cannot ${action} while tender is ${tender.phase}.`, {
      tenderId: tender.id,
      phase: tender.phase,
      action,
      allowedFrom: allowedFrom(action),
    });
  }
  return to;
};

/** Move the tender along the edge for `action`, recording the change at `at`. */
export const applyTransition = (tender: Tender, action: TenderAction, at: string): TenderPhase => {
  const from = tender.phase;
  const to = assertTransition(tender, action);

  tender.phase = to;
  tender.updatedAt = at;
  tender.phaseHistory.push({ from, to, action, at });
  return to;
};

/** Gate for operations that act inside a phase without leaving it. */
export const requirePhase = (tender: Tender, expected: TenderPhase, operation: string): void => {
  if (tender.phase !== expected) {
    throw phaseError(`Cannot ${operation} while tender is ${tender.phase}.`, {
      tenderId: tender.id,
      phase: tender.phase,
      requiredPhase: expected,
    });
  }
};
