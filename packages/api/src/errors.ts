import type { IncidentState } from '@emberline/core';

export type DecodeErrorCode = 'UnknownKind' | 'MalformedTopic' | 'MalformedPayload';

export class DecodeError extends Error {
  readonly statusCode = 400;

  constructor(
    readonly code: DecodeErrorCode,
    message: string,
  ) {
    super(message);
    this.name = 'DecodeError';
  }
}

export class InvalidTransitionError extends Error {
  readonly statusCode = 409;

  constructor(
    readonly incidentId: string,
    readonly from: IncidentState,
    readonly action: 'acknowledge' | 'escalate',
  ) {
    super(`Cannot ${action} incident ${incidentId} in state ${from}`);
    this.name = 'InvalidTransitionError';
  }
}

export class IncidentNotFoundError extends Error {
  readonly statusCode = 404;

  constructor(readonly incidentId: string) {
    super(`Incident ${incidentId} not found`);
    this.name = 'IncidentNotFoundError';
  }
}

export class RoutingError extends Error {
  readonly statusCode = 500;

  constructor(
    readonly incidentId: string,
    message: string,
  ) {
    super(message);
    this.name = 'RoutingError';
  }
}

export class TransientDeliveryError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'TransientDeliveryError';
  }
}

export class PermanentDeliveryError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'PermanentDeliveryError';
  }
}

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}
