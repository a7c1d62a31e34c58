export class AdvisorError extends Error {
  readonly status: number;

  constructor(message: string, status = 500, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.status = status;
  }
}

export class AdvisorUnavailableError extends AdvisorError {
  constructor() {
    super('Advisor not initialized', 500);
  }
}

export class LlmConfigurationError extends AdvisorError {}

export class LlmResponseError extends AdvisorError {}

export const getStatus = (error: unknown): number | undefined => {
  if (error && typeof error === 'object' && 'status' in error) {
    const { status } = error;
    if (typeof status === 'number') {
      return status;
    }
  }
  return undefined;
};

export const getDetail = (error: unknown): string => {
  if (error instanceof Error && error.message) {
    return error.message;
  }

  if (typeof error === 'string' && error) {
    return error;
  }

  return 'Unknown error';
};
