import {
  CollaboratorConfigError,
  CollaboratorHttpError,
  CollaboratorNetworkError,
  CompanyNotRegisteredError,
} from './errorMapping.js';
import type { CollaboratorOperation } from './errorMapping.js';
import type { Collaborators, CollaboratorSuite } from './types.js';

export interface HttpCollaboratorConfig {
  companyDirectoryUrl: string;
  fundingLedgerUrl: string;
  projectFactoryUrl: string;
  apiKey?: string;
  timeoutMs: number;
  fetch?: typeof globalThis.fetch;
}

const readField = (body: unknown, field: string): string | undefined => {
  if (body && typeof body === 'object' && field in body) {
    const value: unknown = Reflect.get(body, field);
    if (typeof value === 'string' && value.trim()) return value;
  }
  return undefined;
};

/**
 * Collaborators reached over HTTP.
 *
 *   GET  {companyDirectoryUrl}/companies/:id  → { representative }
 *   POST {projectFactoryUrl}/projects         { tenderId, companyId } → { projectId }
 *   POST {fundingLedgerUrl}/disbursements     { amount, projectId }
 *
 * Remote effects are not undone when a later step of the same operation fails.
 */
export class HttpCollaboratorClient implements CollaboratorSuite, Collaborators {
  private readonly _fetch: typeof globalThis.fetch;

  constructor(private readonly config: HttpCollaboratorConfig) {
    this._fetch = config.fetch ?? globalThis.fetch;
  }

  get refs(): CollaboratorSuite['refs'] {
    return {
      companyDirectory: this.config.companyDirectoryUrl,
      fundingLedger: this.config.fundingLedgerUrl,
    };
  }

  bind(): Collaborators {
    return this;
  }

  readonly companyDirectory = {
    lookupCompany: async (companyId: number): Promise<string> => {
      try {
        const body = await this.requestJson(
          'lookupCompany',
          this.buildUrl(this.config.companyDirectoryUrl, `/companies/${companyId}`),
          { method: 'GET' },
        );
        const representative = readField(body, 'representative');
        if (!representative) {
          throw new CollaboratorHttpError('lookupCompany', 502, 'response is missing representative');
        }
        return representative;
      } catch (error) {
        if (error instanceof CollaboratorHttpError && error.statusCode === 404) {
          throw new CompanyNotRegisteredError(companyId);
        }
        throw error;
      }
    },
  };

  readonly projectFactory = {
    createProject: async (tenderId: string, companyId: number): Promise<string> => {
      const body = await this.requestJson(
        'createProject',
        this.buildUrl(this.config.projectFactoryUrl, '/projects'),
        { method: 'POST', body: JSON.stringify({ tenderId, companyId }) },
      );
      const projectId = readField(body, 'projectId');
      if (!projectId) {
        throw new CollaboratorHttpError('createProject', 502, 'response is missing projectId');
      }
      return projectId;
    },
  };

  readonly fundingLedger = {
    disburse: async (amount: number, targetProjectId: string): Promise<void> => {
      await this.requestJson(
        'disburse',
        this.buildUrl(this.config.fundingLedgerUrl, '/disbursements'),
        { method: 'POST', body: JSON.stringify({ amount, projectId: targetProjectId }) },
      );
    },
  };

  private buildUrl(baseUrl: string, endpointPath: string): string {
    const trimmed = baseUrl.trim();
    if (!trimmed) {
      throw new CollaboratorConfigError('Collaborator base URL is not configured.', {
        endpointPath,
      });
    }
    return `${trimmed.replace(/\/+$/, '')}${endpointPath}`;
  }

  private async requestJson(operation: CollaboratorOperation, url: string, init: RequestInit): Promise<unknown> {
    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), this.config.timeoutMs);

    try {
      const headers = new Headers(init.headers);
      headers.set('accept', 'application/json');
      if (init.body !== undefined) headers.set('content-type', 'application/json');
      if (this.config.apiKey?.trim()) {
        headers.set('x-api-key', this.config.apiKey.trim());
      }

      const response = await this._fetch(url, {
        ...init,
        headers,
        signal: controller.signal,
      });

      const bodyText = await response.text();
      if (!response.ok) {
        throw new CollaboratorHttpError(operation, response.status, bodyText);
      }

      return bodyText.trim() ? JSON.parse(bodyText) : {};
    } catch (error) {
      if (error instanceof CollaboratorHttpError || error instanceof CollaboratorConfigError) {
        throw error;
      }
      if (error instanceof Error && error.name === 'AbortError') {
        throw error;
      }
      throw new CollaboratorNetworkError(
        operation,
        error instanceof Error ? error.message : String(error),
      );
    } finally {
      clearTimeout(timeout);
    }
  }
}
