import type { AppState } from '../../types.js';

export interface CompanyDirectory {
  /** Authorized representative of the company. Rejects with CompanyNotRegisteredError when unknown. */
  lookupCompany(companyId: number): Promise<string>;
}

export interface FundingLedger {
  disburse(amount: number, targetProjectId: string): Promise<void>;
}

export interface ProjectFactory {
  createProject(tenderId: string, companyId: number): Promise<string>;
}

export interface Collaborators {
  companyDirectory: CompanyDirectory;
  fundingLedger: FundingLedger;
  projectFactory: ProjectFactory;
}

export interface CollaboratorRefs {
  companyDirectory: string;
  fundingLedger: string;
}

/**
 * Source of collaborators for one transaction. `bind` receives the draft
 * state of that transaction and the caller's clock; suites that keep their
 * records in the application state write through it so their effects
 * commit or roll back with the tender.
 */
export interface CollaboratorSuite {
  readonly refs: CollaboratorRefs;
  bind(state: AppState, timestamp: () => string): Collaborators;
}
