// ─── SDK Types ─────────────────────────────────────────────────────────────
// Self-contained types for the Tender Governance API SDK.
// These mirror the API responses but are decoupled from internal server types.
// ────────────────────────────────────────────────────────────────────────────

export type TenderPhase =
  | 'voting'
  | 'approved'
  | 'declined'
  | 'proposing'
  | 'proposal_voting'
  | 'voting_closed'
  | 'awarded';

// ─── Tender ────────────────────────────────────────────────────────────────

export interface Proposal {
  id: number;
  companyId: number;
  descriptorUri: string;
  voteCount: number;
  submittedBy: string;
  submittedAt: string;
}

export interface ApprovalVote {
  voterId: string;
  votedAt: string;
}

export interface ProposalBallot {
  voterId: string;
  proposalId: number;
  votedAt: string;
}

export interface PhaseChange {
  from: TenderPhase;
  to: TenderPhase;
  action: string;
  at: string;
}

export interface Tender {
  id: string;
  phase: TenderPhase;
  admin: string;
  descriptorUri: string;
  companyDirectoryRef: string;
  fundingLedgerRef: string;
  createdAt: string;
  updatedAt: string;
  votingDeadline: string;
  requiredYesVotes: number;
  yesVoteCount: number;
  approvalVotes: ApprovalVote[];
  proposals: Proposal[];
  proposalVotes: ProposalBallot[];
  currentWinningProposalIndex: number;
  winningProposalIndex: number | null;
  awardedProjectRef: string | null;
  fundingAmount: number | null;
  phaseHistory: PhaseChange[];
}

export interface CreateTenderOpts {
  descriptorUri: string;
  durationSeconds?: number;
  requiredYesVotes?: number;
}

export interface SubmitProposalOpts {
  companyId: number;
  descriptorUri: string;
}

export interface AwardResponse {
  tender: Tender;
  proposal: Proposal;
  projectId: string;
}

// ─── System ────────────────────────────────────────────────────────────────

export interface HealthResponse {
  name: string;
  status: string;
  collaborators: 'local' | 'http';
}

// ─── Errors ────────────────────────────────────────────────────────────────

export interface APIErrorEnvelope {
  error: {
    code: string;
    message: string;
    details?: unknown;
  };
}
