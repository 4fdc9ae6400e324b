import {
  BadRequestException,
  ConflictException,
  NotFoundException,
  UnauthorizedException,
} from '@nestjs/common';

export class MalformedEventError extends BadRequestException {
  constructor(reason: string) {
    super({ message: `Malformed booking event: ${reason}`, error: 'MalformedEvent' });
    this.name = 'MalformedEventError';
  }
}

export class InvalidSignatureError extends UnauthorizedException {
  constructor(reason: string) {
    super({ message: `Webhook signature rejected: ${reason}`, error: 'InvalidSignature' });
    this.name = 'InvalidSignatureError';
  }
}

export class BookingNotFoundError extends NotFoundException {
  constructor(bookingId: string) {
    super({ message: `Booking ${bookingId} not found`, error: 'BookingNotFound' });
    this.name = 'BookingNotFoundError';
  }
}

export class SessionNotFoundError extends NotFoundException {
  constructor(sessionId: string) {
    super({ message: `Chat session ${sessionId} not found`, error: 'SessionNotFound' });
    this.name = 'SessionNotFoundError';
  }
}

/**
 * Raised for messages sent to a closed session. The message is already
 * localized for the guest.
 */
export class SessionClosedError extends ConflictException {
  constructor(
    readonly sessionId: string,
    localizedMessage: string,
  ) {
    super({ message: localizedMessage, error: 'SessionClosed' });
    this.name = 'SessionClosedError';
  }
}

export class InvalidCategoryError extends BadRequestException {
  constructor(category: string, allowed: readonly string[]) {
    super({
      message: `Invalid category "${category}". Must be one of: ${allowed.join(', ')}`,
      error: 'InvalidCategory',
    });
    this.name = 'InvalidCategoryError';
  }
}

export interface ProviderAttemptFailure {
  provider: string;
  reason: string;
}

export class GeocodeError extends Error {
  readonly exhausted = true;

  constructor(
    readonly locationText: string,
    readonly attempts: ProviderAttemptFailure[],
  ) {
    super(`All geocoding providers failed for "${locationText}"`);
    this.name = 'GeocodeError';
  }
}

export class RecommendationError extends Error {
  readonly allProvidersFailed = true;

  constructor(
    readonly category: string,
    readonly attempts: ProviderAttemptFailure[],
  ) {
    super(`All place providers failed for category ${category}`);
    this.name = 'RecommendationError';
  }
}
