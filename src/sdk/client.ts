// ─── TenderAPIClient ───────────────────────────────────────────────────────
// Lightweight, zero-dependency SDK client for the Tender Governance API.
// Uses native fetch. Every call is made as the identity given in `callerId`.
// ────────────────────────────────────────────────────────────────────────────

import type {
  APIErrorEnvelope,
  AwardResponse,
  CreateTenderOpts,
  HealthResponse,
  Proposal,
  SubmitProposalOpts,
  Tender,
  TenderPhase,
} from './types.js';

export class TenderAPIError extends Error {
  constructor(
    public readonly status: number,
    public readonly code: string,
    message: string,
    public readonly details?: unknown,
  ) {
    super(message);
    this.name = 'TenderAPIError';
  }
}

export interface TenderAPIClientOptions {
  /** Base URL of the API server (e.g. "http://localhost:8787"). */
  baseUrl: string;
  /** Identity sent as x-caller-id (voter, company representative or admin). */
  callerId?: string;
  /** Optional custom fetch implementation (defaults to globalThis.fetch). */
  fetch?: typeof globalThis.fetch;
}

export class TenderAPIClient {
  private readonly baseUrl: string;
  private readonly callerId?: string;
  private readonly _fetch: typeof globalThis.fetch;

  constructor(opts: TenderAPIClientOptions) {
    this.baseUrl = opts.baseUrl.replace(/\/+$/, '');
    this.callerId = opts.callerId;
    this._fetch = opts.fetch ?? globalThis.fetch;
  }

  /** Same server, different identity. */
  as(callerId: string): TenderAPIClient {
    return new TenderAPIClient({ baseUrl: this.baseUrl, callerId, fetch: this._fetch });
  }

  // ─── Internal helpers ──────────────────────────────────────────────────

  private headers(): Record<string, string> {
    const h: Record<string, string> = { 'content-type': 'application/json' };
    if (this.callerId) h['x-caller-id'] = this.callerId;
    return h;
  }

  private async request<T>(method: string, path: string, body?: unknown): Promise<T> {
    const url = `${this.baseUrl}${path}`;
    const res = await this._fetch(url, {
      method,
      headers: this.headers(),
      body: body !== undefined ? JSON.stringify(body) : undefined,
    });

    if (!res.ok) {
      let errorBody: APIErrorEnvelope | undefined;
      try {
        errorBody = (await res.json()) as APIErrorEnvelope;
      } catch {
        errorBody = undefined;
      }
      throw new TenderAPIError(
        res.status,
        errorBody?.error?.code ?? `HTTP_${res.status}`,
        errorBody?.error?.message ?? `Request failed: ${method} ${path} → ${res.status}`,
        errorBody?.error?.details,
      );
    }

    return (await res.json()) as T;
  }

  private get<T>(path: string): Promise<T> {
    return this.request<T>('GET', path);
  }

  private post<T>(path: string, body?: unknown): Promise<T> {
    return this.request<T>('POST', path, body ?? {});
  }

  private tenderPath(tenderId: string, suffix = ''): string {
    return `/tenders/${encodeURIComponent(tenderId)}${suffix}`;
  }

  // ─── System ────────────────────────────────────────────────────────────

  async health(): Promise<HealthResponse> {
    return this.get<HealthResponse>('/');
  }

  // ─── Tenders ───────────────────────────────────────────────────────────

  /** Deploy a tender; the caller becomes its admin. */
  async createTender(opts: CreateTenderOpts): Promise<Tender> {
    const { tender } = await this.post<{ tender: Tender }>('/tenders', opts);
    return tender;
  }

  async listTenders(phase?: TenderPhase): Promise<Tender[]> {
    const query = phase ? `?phase=${encodeURIComponent(phase)}` : '';
    const { tenders } = await this.get<{ tenders: Tender[] }>(`/tenders${query}`);
    return tenders;
  }

  async getTender(tenderId: string): Promise<Tender> {
    const { tender } = await this.get<{ tender: Tender }>(this.tenderPath(tenderId));
    return tender;
  }

  async castApprovalVote(tenderId: string): Promise<Tender> {
    const { tender } = await this.post<{ tender: Tender }>(this.tenderPath(tenderId, '/approval-votes'));
    return tender;
  }

  // ─── Proposals ─────────────────────────────────────────────────────────

  async listProposals(tenderId: string): Promise<Proposal[]> {
    const { proposals } = await this.get<{ proposals: Proposal[] }>(this.tenderPath(tenderId, '/proposals'));
    return proposals;
  }

  async submitProposal(tenderId: string, opts: SubmitProposalOpts): Promise<Proposal> {
    const { proposal } = await this.post<{ proposal: Proposal }>(this.tenderPath(tenderId, '/proposals'), opts);
    return proposal;
  }

  async voteForProposal(tenderId: string, proposalId: number): Promise<Tender> {
    const { tender } = await this.post<{ tender: Tender }>(
      this.tenderPath(tenderId, `/proposals/${proposalId}/votes`),
    );
    return tender;
  }

  // ─── Admin ─────────────────────────────────────────────────────────────

  async overrideAndApprove(tenderId: string): Promise<Tender> {
    return this.adminTransition(tenderId, 'approve');
  }

  async overrideAndDecline(tenderId: string): Promise<Tender> {
    return this.adminTransition(tenderId, 'decline');
  }

  async openTenderForProposals(tenderId: string): Promise<Tender> {
    return this.adminTransition(tenderId, 'open-proposals');
  }

  async closeProposingAndOpenVoting(tenderId: string): Promise<Tender> {
    return this.adminTransition(tenderId, 'close-proposals');
  }

  async closeProposalVoting(tenderId: string): Promise<Tender> {
    return this.adminTransition(tenderId, 'close-proposal-voting');
  }

  async awardProposal(tenderId: string, fundingAmount: number): Promise<AwardResponse> {
    return this.post<AwardResponse>(this.tenderPath(tenderId, '/admin/award'), { fundingAmount });
  }

  async updateAdmin(tenderId: string, newAdmin: string): Promise<Tender> {
    const { tender } = await this.post<{ tender: Tender }>(this.tenderPath(tenderId, '/admin/transfer'), { newAdmin });
    return tender;
  }

  private async adminTransition(tenderId: string, action: string): Promise<Tender> {
    const { tender } = await this.post<{ tender: Tender }>(this.tenderPath(tenderId, `/admin/${action}`));
    return tender;
  }
}
