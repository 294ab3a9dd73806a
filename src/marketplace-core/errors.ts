/**
 * Typed errors for marketplace operations.
 *
 * Every rejected operation surfaces as one of these, carrying a stable `code`
 * and the category it belongs to. None of them is transient.
 */

import type { ErrorCode } from '@shared/types';

export type ErrorCategory =
  | 'authorization'
  | 'state'
  | 'validation'
  | 'resource'
  | 'uniqueness'
  | 'lookup';

/** Base error for every rejected marketplace operation */
export class MarketplaceError extends Error {
  constructor(
    public readonly code: ErrorCode,
    public readonly category: ErrorCategory,
    message: string,
  ) {
    super(message);
    this.name = 'MarketplaceError';
  }
}

/** Wrong role or wrong caller identity */
export class AuthorizationError extends MarketplaceError {
  constructor(message: string) {
    super('Unauthorized', 'authorization', message);
    this.name = 'AuthorizationError';
  }
}

/** Record is not in the state the operation needs */
export class StateError extends MarketplaceError {
  constructor(
    code: 'JobAlreadyFilled' | 'ApplicationNotApproved' | 'WorkNotCompleted' | 'AlreadyPaid',
    message: string,
  ) {
    super(code, 'state', message);
    this.name = 'StateError';
  }
}

/** Malformed input: field limits, dates, mismatched references */
export class ValidationError extends MarketplaceError {
  constructor(code: 'InvalidDates' | 'InvalidInput' | 'InvalidApplication', message: string) {
    super(code, 'validation', message);
    this.name = 'ValidationError';
  }
}

/** Funds are missing or escrow does not hold what the job says */
export class ResourceError extends MarketplaceError {
  constructor(code: 'InsufficientFunds' | 'EscrowMismatch' | 'BalanceOverflow', message: string) {
    super(code, 'resource', message);
    this.name = 'ResourceError';
  }
}

/** Duplicate registration, job title or application */
export class AlreadyExistsError extends MarketplaceError {
  constructor(message: string) {
    super('AlreadyExists', 'uniqueness', message);
    this.name = 'AlreadyExistsError';
  }
}

export class NotFoundError extends MarketplaceError {
  constructor(kind: 'User' | 'Job' | 'Application' | 'Escrow', id: string) {
    super('NotFound', 'lookup', `${kind} not found: ${id}`);
    this.name = 'NotFoundError';
  }
}

export function isMarketplaceError(err: unknown): err is MarketplaceError {
  return err instanceof MarketplaceError;
}

/**
 * Builds the typed error for a rejection code coming out of the state machine.
 */
export function errorForCode(code: ErrorCode, message: string): MarketplaceError {
  switch (code) {
    case 'Unauthorized':
      return new AuthorizationError(message);
    case 'JobAlreadyFilled':
    case 'ApplicationNotApproved':
    case 'WorkNotCompleted':
    case 'AlreadyPaid':
      return new StateError(code, message);
    case 'InvalidDates':
    case 'InvalidInput':
    case 'InvalidApplication':
      return new ValidationError(code, message);
    case 'InsufficientFunds':
    case 'EscrowMismatch':
    case 'BalanceOverflow':
      return new ResourceError(code, message);
    case 'AlreadyExists':
      return new AlreadyExistsError(message);
    case 'NotFound':
      return new MarketplaceError(code, 'lookup', message);
  }
}
