import dotenv from 'dotenv';
import path from 'node:path';

dotenv.config();

const parseNumber = (input: string | undefined, fallback: number): number => {
  if (input === undefined) return fallback;
  const n = Number(input);
  return Number.isFinite(n) ? n : fallback;
};

export type CollaboratorMode = 'local' | 'http';

export const config = {
  app: {
    name: 'tender-governance-api',
    env: process.env.NODE_ENV ?? 'development',
    port: parseNumber(process.env.PORT, 8787),
  },
  paths: {
    dataDir: process.env.DATA_DIR ?? path.resolve(process.cwd(), 'data'),
    stateFile: process.env.STATE_FILE ?? path.resolve(process.cwd(), 'data', 'state.json'),
    logFile: process.env.LOG_FILE ?? path.resolve(process.cwd(), 'data', 'events.ndjson'),
  },
  tender: {
    defaultDurationSeconds: parseNumber(process.env.TENDER_DEFAULT_DURATION_SECONDS, 7 * 24 * 60 * 60),
    defaultRequiredYesVotes: parseNumber(process.env.TENDER_DEFAULT_REQUIRED_YES_VOTES, 3),
    minProposalsToVote: Math.max(1, parseNumber(process.env.TENDER_MIN_PROPOSALS_TO_VOTE, 1)),
  },
  collaborators: {
    mode: (process.env.COLLABORATORS_MODE === 'http' ? 'http' : 'local') as CollaboratorMode,
    companyDirectoryUrl: process.env.COMPANY_DIRECTORY_URL ?? '',
    fundingLedgerUrl: process.env.FUNDING_LEDGER_URL ?? '',
    projectFactoryUrl: process.env.PROJECT_FACTORY_URL ?? '',
    apiKey: process.env.COLLABORATORS_API_KEY,
    timeoutMs: parseNumber(process.env.COLLABORATORS_TIMEOUT_MS, 10_000),
  },
  registry: {
    // Only this caller may register companies or deposit into the local ledger; empty disables both.
    operatorId: process.env.REGISTRY_OPERATOR_ID?.trim() ?? '',
  },
  ledger: {
    initialBalance: parseNumber(process.env.LEDGER_INITIAL_BALANCE, 0),
  },
};

export type AppConfig = typeof config;
