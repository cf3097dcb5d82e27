/**
 * Administration of the local collaborators: company registrations,
 * ledger deposits and the project records created by awards.
 */

import { DomainError, ErrorCode } from '../errors/taxonomy.js';
import { eventBus } from '../infra/eventBus.js';
import { StateStore } from '../infra/storage/stateStore.js';
import type { LedgerState, ProjectRecord, RegisteredCompany } from '../types.js';
import { ownValue } from '../utils/records.js';
import { isoNow } from '../utils/time.js';

export interface RegisterCompanyInput {
  id: number;
  name: string;
  representative: string;
}

export class RegistryService {
  constructor(private readonly store: StateStore) {}

  async registerCompany(input: RegisterCompanyInput): Promise<RegisteredCompany> {
    const company = await this.store.transaction((state) => {
      const key = String(input.id);
      if (ownValue(state.companies, key)) {
        throw new DomainError(
          ErrorCode.CompanyAlreadyRegistered,
          409,
          `Company ${input.id} is already registered.`,
          { companyId: input.id },
        );
      }

      const registered: RegisteredCompany = {
        id: input.id,
        name: input.name,
        representative: input.representative,
        registeredAt: isoNow(),
      };
      state.companies[key] = registered;
      return registered;
    });

    eventBus.emit('registry.company_registered', company);
    return company;
  }

  listCompanies(): RegisteredCompany[] {
    return Object.values(this.store.snapshot().companies).sort((a, b) => a.id - b.id);
  }

  async deposit(amount: number): Promise<LedgerState> {
    if (!Number.isFinite(amount) || amount <= 0) {
      throw new DomainError(ErrorCode.InvalidPayload, 400, 'Deposit amount must be positive.', { amount });
    }

    const ledger = await this.store.transaction((state) => {
      state.ledger.balance += amount;
      state.ledger.deposits += amount;
      return structuredClone(state.ledger);
    });

    eventBus.emit('ledger.deposited', { amount, balance: ledger.balance });
    return ledger;
  }

  getLedger(): LedgerState {
    return this.store.snapshot().ledger;
  }

  listProjects(tenderId?: string): ProjectRecord[] {
    const projects = Object.values(this.store.snapshot().projects);
    return (tenderId ? projects.filter((p) => p.tenderId === tenderId) : projects)
      .sort((a, b) => a.createdAt.localeCompare(b.createdAt));
  }
}
