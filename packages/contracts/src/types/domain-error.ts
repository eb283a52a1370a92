export interface DomainError {
  readonly code: string;
  readonly message: string;
  readonly details?: Record<string, unknown>;
}

export interface InfraError extends DomainError {
  readonly retryable?: boolean;
}

export type TrailError = DomainError | InfraError;

export const createDomainError = (
  code: string,
  message: string,
  details?: Record<string, unknown>,
): DomainError => ({
  code,
  message,
  details,
});

export const createInfraError = (
  code: string,
  message: string,
  cause?: unknown,
  retryable = true,
): InfraError => ({
  code,
  message,
  details: cause === undefined ? undefined : { cause: describeCause(cause) },
  retryable,
});

export const describeCause = (cause: unknown): string => {
  if (cause instanceof Error) {
    return `${cause.name}: ${cause.message}`;
  }
  return typeof cause === "string" ? cause : String(cause);
};
