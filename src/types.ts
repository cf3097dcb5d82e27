import type { Tender } from './domain/tender/tenderTypes.js';

export interface RegisteredCompany {
  id: number;
  name: string;
  representative: string;
  registeredAt: string;
}

export interface ProjectRecord {
  id: string;
  tenderId: string;
  companyId: number;
  createdAt: string;
  fundedAmount: number;
}

export interface Disbursement {
  id: string;
  projectId: string;
  amount: number;
  createdAt: string;
}

export interface LedgerState {
  balance: number;
  deposits: number;
  disbursements: Disbursement[];
}

export interface RuntimeMetrics {
  startedAt: string;
  tendersCreated: number;
  approvalVotes: number;
  proposalsSubmitted: number;
  proposalVotes: number;
  overrides: number;
  awards: number;
}

export interface AppState {
  tenders: Record<string, Tender>;
  /** Local company registry, keyed by company id. */
  companies: Record<string, RegisteredCompany>;
  /** Local project records, keyed by project id. */
  projects: Record<string, ProjectRecord>;
  ledger: LedgerState;
  metrics: RuntimeMetrics;
}
