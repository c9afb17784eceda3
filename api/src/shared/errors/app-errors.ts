import {
  ConflictException,
  ForbiddenException,
  NotFoundException,
  UnauthorizedException
} from '@nestjs/common';

export class InvalidCredentialsError extends UnauthorizedException {
  constructor() {
    super('Invalid credentials');
    this.name = 'InvalidCredentialsError';
  }
}

export type InvalidTokenReason = 'malformed' | 'signature' | 'expired' | 'claims' | 'kind';

export class InvalidTokenError extends UnauthorizedException {
  constructor(public readonly reason: InvalidTokenReason) {
    super('Invalid token');
    this.name = 'InvalidTokenError';
  }
}

export class UnauthenticatedError extends UnauthorizedException {
  constructor(message = 'Authentication required') {
    super(message);
    this.name = 'UnauthenticatedError';
  }
}

// Covers tenant mismatch as well as role/ownership mismatch; the message never says which.
export class ForbiddenError extends ForbiddenException {
  constructor() {
    super('Insufficient permissions');
    this.name = 'ForbiddenError';
  }
}

// Absent and cross-tenant resources share this outcome.
export class NotFoundError extends NotFoundException {
  constructor() {
    super('Not found');
    this.name = 'NotFoundError';
  }
}

export class ConflictError extends ConflictException {
  constructor(message: string) {
    super(message);
    this.name = 'ConflictError';
  }
}

const PG_UNIQUE_VIOLATION = '23505';

export function isUniqueViolation(error: unknown): boolean {
  return (
    typeof error === 'object' &&
    error !== null &&
    'code' in error &&
    error.code === PG_UNIQUE_VIOLATION
  );
}
