import fs from 'node:fs/promises';
import path from 'node:path';
import type { Tender } from '../../domain/tender/tenderTypes.js';
import type { AppState } from '../../types.js';
import { createDefaultState } from './defaultState.js';

const isMissingFile = (error: unknown): boolean => (
  error instanceof Error && 'code' in error && error.code === 'ENOENT'
);

const normalizeState = (raw: unknown, initialBalance: number): AppState => {
  const defaults = createDefaultState(initialBalance);
  const parsed = (raw && typeof raw === 'object' ? raw : {}) as Partial<AppState>;

  const tenders = Object.fromEntries(
    Object.entries(parsed.tenders ?? {}).map(([id, tender]) => {
      const typed = tender as Tender;
      return [id, {
        ...typed,
        approvalVotes: Array.isArray(typed.approvalVotes) ? typed.approvalVotes : [],
        proposals: typed.proposals ?? [],
        proposalVotes: Array.isArray(typed.proposalVotes) ? typed.proposalVotes : [],
        currentWinningProposalIndex: typed.currentWinningProposalIndex ?? 0,
        winningProposalIndex: typed.winningProposalIndex ?? null,
        awardedProjectRef: typed.awardedProjectRef ?? null,
        fundingAmount: typed.fundingAmount ?? null,
        phaseHistory: typed.phaseHistory ?? [],
      } satisfies Tender];
    }),
  );

  return {
    ...defaults,
    ...parsed,
    tenders,
    companies: parsed.companies ?? {},
    projects: parsed.projects ?? {},
    ledger: {
      ...defaults.ledger,
      ...(parsed.ledger ?? {}),
      disbursements: parsed.ledger?.disbursements ?? [],
    },
    metrics: {
      ...defaults.metrics,
      ...(parsed.metrics ?? {}),
    },
  };
};

/**
 * JSON-file backed application state.
 *
 * Transactions are serialized through a promise chain and run against a
 * draft copy; the draft replaces the live state only when the work resolves,
 * so a throwing transaction leaves nothing behind.
 */
export class StateStore {
  private state: AppState;
  private lock: Promise<void> = Promise.resolve();

  constructor(
    private readonly stateFilePath: string,
    private readonly initialBalance = 0,
  ) {
    this.state = createDefaultState(initialBalance);
  }

  async init(): Promise<void> {
    await fs.mkdir(path.dirname(this.stateFilePath), { recursive: true });

    try {
      const raw = await fs.readFile(this.stateFilePath, 'utf-8');
      this.state = normalizeState(JSON.parse(raw), this.initialBalance);
    } catch (error) {
      if (!isMissingFile(error)) throw error;
      this.state = createDefaultState(this.initialBalance);
      await this.persist(this.state);
    }
  }

  snapshot(): AppState {
    return structuredClone(this.state);
  }

  async transaction<T>(work: (state: AppState) => Promise<T> | T): Promise<T> {
    const previous = this.lock;
    let release: () => void = () => {};

    this.lock = new Promise<void>((resolve) => {
      release = resolve;
    });

    await previous;
    try {
      const draft = structuredClone(this.state);
      const result = await work(draft);
      await this.persist(draft);
      this.state = draft;
      return result;
    } finally {
      release();
    }
  }

  async flush(): Promise<void> {
    await this.lock;
    await this.persist(this.state);
  }

  private async persist(state: AppState): Promise<void> {
    await fs.writeFile(this.stateFilePath, JSON.stringify(state, null, 2));
  }
}
