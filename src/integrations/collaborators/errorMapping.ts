import { DomainError, ErrorCode } from '../../errors/taxonomy.js';

export type CollaboratorOperation = 'lookupCompany' | 'disburse' | 'createProject';

export class CompanyNotRegisteredError extends Error {
  constructor(public readonly companyId: number) {
    super(`company ${companyId} is not registered`);
    this.name = 'CompanyNotRegisteredError';
  }
}

export class CollaboratorRejectedError extends Error {
  constructor(
    public readonly operation: CollaboratorOperation,
    message: string,
    public readonly details?: Record<string, unknown>,
  ) {
    super(message);
    this.name = 'CollaboratorRejectedError';
  }
}

export class CollaboratorConfigError extends Error {
  constructor(message: string, public readonly details?: Record<string, unknown>) {
    super(message);
    this.name = 'CollaboratorConfigError';
  }
}

export class CollaboratorHttpError extends Error {
  constructor(
    public readonly operation: CollaboratorOperation,
    public readonly statusCode: number,
    public readonly bodyText: string,
  ) {
    super(`${operation} failed with status ${statusCode}`);
    this.name = 'CollaboratorHttpError';
  }
}

export class CollaboratorNetworkError extends Error {
  constructor(
    public readonly operation: CollaboratorOperation,
    message: string,
  ) {
    super(message);
    this.name = 'CollaboratorNetworkError';
  }
}

const summarizeUpstreamBody = (raw: string): string | undefined => {
  const trimmed = raw.trim();
  if (!trimmed) return undefined;

  try {
    const parsed: unknown = JSON.parse(trimmed);
    if (parsed && typeof parsed === 'object') {
      const message = 'message' in parsed ? parsed.message : 'error' in parsed ? parsed.error : undefined;
      if (typeof message === 'string' && message.trim()) {
        return message.slice(0, 300);
      }
    }
    return trimmed.slice(0, 300);
  } catch {
    return trimmed.slice(0, 300);
  }
};

export const mapCollaboratorError = (error: unknown, operation: CollaboratorOperation): DomainError => {
  if (error instanceof DomainError) {
    return error;
  }

  if (error instanceof CompanyNotRegisteredError) {
    return new DomainError(
      ErrorCode.CompanyNotFound,
      404,
      `Company ${error.companyId} is not in the company directory.`,
      { operation, companyId: error.companyId },
    );
  }

  if (error instanceof CollaboratorRejectedError) {
    return new DomainError(
      ErrorCode.DependencyFailure,
      502,
      `${operation} was rejected: ${error.message}`,
      { operation, ...(error.details ?? {}) },
    );
  }

  if (error instanceof CollaboratorConfigError) {
    return new DomainError(
      ErrorCode.DependencyFailure,
      503,
      'Collaborator integration is misconfigured.',
      { operation, ...(error.details ?? {}) },
    );
  }

  if (error instanceof CollaboratorHttpError) {
    return new DomainError(
      ErrorCode.DependencyFailure,
      502,
      `${operation} failed upstream.`,
      {
        operation,
        upstreamStatus: error.statusCode,
        upstreamMessage: summarizeUpstreamBody(error.bodyText),
      },
    );
  }

  if (error instanceof CollaboratorNetworkError) {
    return new DomainError(
      ErrorCode.DependencyFailure,
      502,
      `Unable to reach collaborator for ${operation}.`,
      { operation, reason: error.message },
    );
  }

  if (error instanceof Error && error.name === 'AbortError') {
    return new DomainError(
      ErrorCode.DependencyFailure,
      504,
      `${operation} timed out.`,
      { operation },
    );
  }

  return new DomainError(
    ErrorCode.DependencyFailure,
    502,
    `Unexpected collaborator error during ${operation}.`,
    { operation, error: String(error) },
  );
};
