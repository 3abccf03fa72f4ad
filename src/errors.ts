import { isAxiosError } from 'axios';

export type ServiceName = 'chat' | 'geocoding' | 'weather';

const SERVICE_LABELS: Record<ServiceName, string> = {
  chat: 'Chat',
  geocoding: 'Geocoding',
  weather: 'Weather API',
};

export class ServiceRequestError extends Error {
  readonly service: ServiceName;
  readonly status?: number;

  constructor(service: ServiceName, message: string, options?: { status?: number; cause?: unknown }) {
    super(message, { cause: options?.cause });
    this.name = 'ServiceRequestError';
    this.service = service;
    this.status = options?.status;
  }
}

/**
 * Normalise anything thrown by an HTTP call into a ServiceRequestError
 * carrying the upstream status, when there was one.
 */
export function toServiceRequestError(service: ServiceName, err: unknown): ServiceRequestError {
  if (err instanceof ServiceRequestError) return err;

  const label = SERVICE_LABELS[service];
  if (isAxiosError(err)) {
    const status = err.response?.status;
    if (status !== undefined) {
      return new ServiceRequestError(service, `${label} request failed with status ${status}`, { status, cause: err });
    }
    return new ServiceRequestError(service, `${label} request failed: ${err.message}`, { cause: err });
  }

  const message = err instanceof Error ? err.message : String(err);
  return new ServiceRequestError(service, `${label} request failed: ${message}`, { cause: err });
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
