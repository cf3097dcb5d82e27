import type { AppState } from '../../types.js';
import { isoNow } from '../../utils/time.js';

export const createDefaultState = (initialBalance = 0): AppState => ({
  tenders: {},
  companies: {},
  projects: {},
  ledger: {
    balance: initialBalance,
    deposits: initialBalance,
    disbursements: [],
  },
  metrics: {
    startedAt: isoNow(),
    tendersCreated: 0,
    approvalVotes: 0,
    proposalsSubmitted: 0,
    proposalVotes: 0,
    overrides: 0,
    awards: 0,
  },
});
