export const ErrorCode = {
  InvalidPayload: 'invalid_payload',
  MissingCallerId: 'missing_caller_id',
  InvalidPhase: 'invalid_phase',
  UnauthorizedCaller: 'unauthorized_caller',
  DuplicateVote: 'duplicate_vote',
  VotingDeadlinePassed: 'voting_deadline_passed',
  TenderNotFound: 'tender_not_found',
  ProposalNotFound: 'proposal_not_found',
  CompanyNotFound: 'company_not_found',
  CompanyAlreadyRegistered: 'company_already_registered',
  DependencyFailure: 'dependency_failure',
  InternalError: 'internal_error',
} as const;

export type ErrorCode = typeof ErrorCode[keyof typeof ErrorCode];

export class DomainError extends Error {
  constructor(
    public readonly code: ErrorCode,
    public readonly statusCode: number,
    message: string,
    public readonly details?: Record<string, unknown>,
  ) {
    super(message);
  }
}

export const toErrorEnvelope = (
  code: ErrorCode,
  message: string,
  details?: unknown,
): {
  error: {
    code: ErrorCode;
    message: string;
    details?: unknown;
  };
} => ({
  error: {
    code,
    message,
    ...(details === undefined ? {} : { details }),
  },
});

export const phaseError = (message: string, details?: Record<string, unknown>): DomainError => (
  new DomainError(ErrorCode.InvalidPhase, 409, message, details)
);

export const unauthorizedError = (message: string, details?: Record<string, unknown>): DomainError => (
  new DomainError(ErrorCode.UnauthorizedCaller, 403, message, details)
);

export const duplicateVoteError = (message: string, details?: Record<string, unknown>): DomainError => (
  new DomainError(ErrorCode.DuplicateVote, 409, message, details)
);
