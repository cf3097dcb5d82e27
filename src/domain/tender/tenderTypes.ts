/**
 * Tender lifecycle types.
 *
 * A tender is approved by an open yes-vote, then collects proposals from
 * registered companies, then votes on those proposals, and is finally
 * awarded to the leading proposal by its admin.
 */

export type TenderPhase =
  | 'voting'
  | 'approved'
  | 'declined'
  | 'proposing'
  | 'proposal_voting'
  | 'voting_closed'
  | 'awarded';

export type TenderAction =
  | 'approvalThresholdReached'
  | 'overrideApprove'
  | 'overrideDecline'
  | 'openProposing'
  | 'closeProposing'
  | 'closeProposalVoting'
  | 'award';

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
  action: TenderAction;
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
  /** One entry per voter, in voting order. */
  approvalVotes: ApprovalVote[];
  proposals: Proposal[];
  /** One entry per (voter, proposal) pair. */
  proposalVotes: ProposalBallot[];
  currentWinningProposalIndex: number;
  winningProposalIndex: number | null;
  awardedProjectRef: string | null;
  fundingAmount: number | null;
  phaseHistory: PhaseChange[];
}
