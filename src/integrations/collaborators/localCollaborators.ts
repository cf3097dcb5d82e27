import { v4 as uuid } from 'uuid';
import type { AppState } from '../../types.js';
import { ownValue } from '../../utils/records.js';
import { CollaboratorRejectedError, CompanyNotRegisteredError } from './errorMapping.js';
import type { Collaborators, CollaboratorSuite } from './types.js';

export const LOCAL_COMPANY_DIRECTORY_REF = 'local:company-directory';
export const LOCAL_FUNDING_LEDGER_REF = 'local:funding-ledger';

/**
 * In-process collaborators kept in the application state file: a company
 * registry, a project record table and a funding ledger with a balance.
 */
export const localCollaborators: CollaboratorSuite = {
  refs: {
    companyDirectory: LOCAL_COMPANY_DIRECTORY_REF,
    fundingLedger: LOCAL_FUNDING_LEDGER_REF,
  },

  bind(state: AppState, timestamp: () => string): Collaborators {
    return {
      companyDirectory: {
        async lookupCompany(companyId) {
          const company = ownValue(state.companies, String(companyId));
          if (!company) throw new CompanyNotRegisteredError(companyId);
          return company.representative;
        },
      },

      projectFactory: {
        async createProject(tenderId, companyId) {
          const id = uuid();
          state.projects[id] = {
            id,
            tenderId,
            companyId,
            createdAt: timestamp(),
            fundedAmount: 0,
          };
          return id;
        },
      },

      fundingLedger: {
        async disburse(amount, targetProjectId) {
          const project = ownValue(state.projects, targetProjectId);
          if (!project) {
            throw new CollaboratorRejectedError('disburse', 'target project does not exist', {
              projectId: targetProjectId,
            });
          }
          if (amount > state.ledger.balance) {
            throw new CollaboratorRejectedError('disburse', 'insufficient ledger balance', {
              requested: amount,
              balance: state.ledger.balance,
            });
          }

          state.ledger.balance -= amount;
          state.ledger.disbursements.push({
            id: uuid(),
            projectId: targetProjectId,
            amount,
            createdAt: timestamp(),
          });
          project.fundedAmount += amount;
        },
      },
    };
  },
};
