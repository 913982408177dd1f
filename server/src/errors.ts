import axios from 'axios';

import type { UpstreamProvider } from './observability/metrics';

export type UpstreamErrorKind = 'http' | 'provider_status' | 'malformed' | 'transport';

/**
 * Échec d'un appel vers Google Maps ou AstronomyAPI.
 * Aucune distinction transitoire / permanente : l'appel est relancé par l'utilisateur.
 */
export abstract class UpstreamError extends Error {
  abstract readonly kind: UpstreamErrorKind;

  protected constructor(
    readonly provider: UpstreamProvider,
    readonly operation: string,
    message: string
  ) {
    super(message);
    this.name = new.target.name;
  }
}

/** Réponse HTTP non 2xx. */
export class HttpFailure extends UpstreamError {
  readonly kind = 'http';

  constructor(provider: UpstreamProvider, operation: string, readonly statusCode: number) {
    super(provider, operation, `${operation} failed with HTTP ${statusCode}`);
  }
}

/** HTTP 200 mais champ `status` différent de OK (API Google uniquement). */
export class ProviderStatusFailure extends UpstreamError {
  readonly kind = 'provider_status';

  constructor(provider: UpstreamProvider, operation: string, readonly status: string) {
    super(provider, operation, `${operation} returned provider status ${status}`);
  }
}

export class MalformedResponse extends UpstreamError {
  readonly kind = 'malformed';

  constructor(provider: UpstreamProvider, operation: string, readonly missingField: string) {
    super(provider, operation, `${operation} response is missing ${missingField}`);
  }
}

/** Timeout, DNS, connexion coupée : aucune réponse HTTP. */
export class TransportFailure extends UpstreamError {
  readonly kind = 'transport';

  constructor(provider: UpstreamProvider, operation: string, readonly code: string) {
    super(provider, operation, `${operation} did not complete (${code})`);
  }
}

export class InvariantError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'InvariantError';
  }
}

export function transportCode(err: unknown): string {
  if (axios.isAxiosError(err)) {
    return err.code ?? 'ERR_NETWORK';
  }
  return err instanceof Error ? err.message : String(err);
}

/** Entrée utilisateur incohérente avec l'état de la session (400). */
export class RequestValidationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'RequestValidationError';
  }
}
