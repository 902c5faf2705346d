import {
  BadRequestException,
  ConflictException,
  HttpException,
  InternalServerErrorException,
  NotFoundException,
  RequestTimeoutException,
  ServiceUnavailableException,
} from '@nestjs/common';

export const TOOL_ERROR_TYPES = [
  'EmptyCorpusError',
  'InvalidParameterError',
  'GraphNotFoundError',
  'BuildInProgressError',
  'BuildTimeoutError',
  'BuildCancelledError',
  'PersistenceError',
  'EngineUnavailableError',
] as const;

export type ToolErrorType = (typeof TOOL_ERROR_TYPES)[number];

// Nest has no constant for it; 499 is the conventional "client closed request".
const CLIENT_CLOSED_REQUEST = 499;

export class EmptyCorpusError extends BadRequestException {
  readonly errorType = 'EmptyCorpusError';

  constructor(domain: string) {
    super(`Corpus for domain "${domain}" is empty or yields no terms`);
  }
}

export class InvalidParameterError extends BadRequestException {
  readonly errorType = 'InvalidParameterError';

  constructor(message: string) {
    super(message);
  }
}

export class GraphNotFoundError extends NotFoundException {
  readonly errorType = 'GraphNotFoundError';

  constructor(domain: string) {
    super(
      `No knowledge graph found for domain "${domain}". Build one first with build_knowledge_graph.`,
    );
  }
}

export class BuildInProgressError extends ConflictException {
  readonly errorType = 'BuildInProgressError';

  constructor(domain: string) {
    super(`A build for domain "${domain}" is already in progress`);
  }
}

export class BuildTimeoutError extends RequestTimeoutException {
  readonly errorType = 'BuildTimeoutError';

  constructor(domain: string, timeoutMs: number) {
    super(`Build for domain "${domain}" did not finish within ${timeoutMs}ms`);
  }
}

export class BuildCancelledError extends HttpException {
  readonly errorType = 'BuildCancelledError';

  constructor(domain: string) {
    super(`Build for domain "${domain}" was cancelled`, CLIENT_CLOSED_REQUEST);
  }
}

export class PersistenceError extends InternalServerErrorException {
  readonly errorType = 'PersistenceError';

  constructor(message: string) {
    super(message);
  }
}

export class EngineUnavailableError extends ServiceUnavailableException {
  readonly errorType = 'EngineUnavailableError';

  constructor(message = 'No configured image-generation engine is available') {
    super(message);
  }
}

export type KnowledgeGraphError =
  | EmptyCorpusError
  | InvalidParameterError
  | GraphNotFoundError
  | BuildInProgressError
  | BuildTimeoutError
  | BuildCancelledError
  | PersistenceError
  | EngineUnavailableError;

/**
 * Narrow an unknown thrown value to one of the engine's classified errors.
 */
export function isKnowledgeGraphError(
  err: unknown,
): err is KnowledgeGraphError {
  return (
    err instanceof HttpException &&
    'errorType' in err &&
    TOOL_ERROR_TYPES.some((type) => type === err.errorType)
  );
}
