// Tender Governance API SDK entry point
export { TenderAPIClient, TenderAPIError } from './client.js';
export type { TenderAPIClientOptions } from './client.js';
export type {
  TenderPhase,
  Tender,
  Proposal,
  PhaseChange,
  ApprovalVote,
  ProposalBallot,
  CreateTenderOpts,
  SubmitProposalOpts,
  AwardResponse,
  HealthResponse,
  APIErrorEnvelope,
} from './types.js';
