import { extractStatusCode } from './utils/error-utils.js';

export enum ErrorCode {
  CONFIG_MISSING = 'CONFIG_MISSING',
  CONFIG_INVALID = 'CONFIG_INVALID',
  AUTH_KEY_MISSING = 'AUTH_KEY_MISSING',
  AUTH_OAUTH_FAILED = 'AUTH_OAUTH_FAILED',
  AUTH_PLATFORM_FAILURE = 'AUTH_PLATFORM_FAILURE',
  IO_FILE_NOT_FOUND = 'IO_FILE_NOT_FOUND',
  IO_PERMISSION_DENIED = 'IO_PERMISSION_DENIED',
  IO_CLONE_FAILED = 'IO_CLONE_FAILED',
  NET_ERROR = 'NET_ERROR',
  PROVIDER_ERROR = 'PROVIDER_ERROR',
  PROVIDER_RATE_LIMITED = 'PROVIDER_RATE_LIMITED',
  PROVIDER_TIMEOUT = 'PROVIDER_TIMEOUT',
  PROVIDER_INVALID_RESPONSE = 'PROVIDER_INVALID_RESPONSE',
  PROVIDER_SAFETY_BLOCK = 'PROVIDER_SAFETY_BLOCK',
  PLATFORM_NOT_FOUND = 'PLATFORM_NOT_FOUND',
  PLATFORM_INVALID_URL = 'PLATFORM_INVALID_URL',
  ANALYSIS_NO_RESULTS = 'ANALYSIS_NO_RESULTS',
  DIAGRAM_NO_DATA = 'DIAGRAM_NO_DATA',
  DIAGRAM_CYCLE = 'DIAGRAM_CYCLE',
  DIAGRAM_INVALID_REFERENCE = 'DIAGRAM_INVALID_REFERENCE',
  INPUT_INVALID = 'INPUT_INVALID',
  INTERNAL_UNKNOWN = 'INTERNAL_UNKNOWN',
}
type ErrorContext = Record<string, string | number | boolean | null | undefined>;
export class TfmapError extends Error {
  public readonly code: ErrorCode;
  public readonly userMessage: string;
  public readonly context: ErrorContext;
  public readonly recoverable: boolean;
  constructor(
    message: string,
    code: ErrorCode,
    userMessage?: string,
    context: ErrorContext = {},
    recoverable = false
  ) {
    super(message);
    this.name = 'TfmapError';
    this.code = code;
    this.userMessage = userMessage ?? message;
    this.context = context;
    this.recoverable = recoverable;
    Error.captureStackTrace(this, TfmapError);
  }
  static fromError(
    error: unknown,
    code = ErrorCode.INTERNAL_UNKNOWN,
    userMessage?: string
  ): TfmapError {
    if (error instanceof TfmapError) return error;
    const message = error instanceof Error ? error.message : String(error);
    const context = error instanceof Error ? { originalError: error.name } : {};
    return new TfmapError(message, code, userMessage, context);
  }
}
export class ConfigurationError extends TfmapError {
  constructor(message: string, configKey?: string) {
    super(
      message,
      ErrorCode.CONFIG_INVALID,
      `Configuration issue: ${message}`,
      { configKey },
      false
    );
    this.name = 'ConfigurationError';
  }
}
interface HttpErrorClassification {
  isRateLimited: boolean;
  isTimeout: boolean;
  isUnauthorized: boolean;
}

function classifyHttpError(
  statusCode: number | undefined,
  message: string
): HttpErrorClassification {
  const isRateLimited = statusCode === 429;
  const isTimeout = statusCode === 408 || /\btimeout\b/i.test(message);
  const isUnauthorized = statusCode === 401 || statusCode === 403;
  return { isRateLimited, isTimeout, isUnauthorized };
}

export class ApiError extends TfmapError {
  public readonly statusCode?: number;
  public readonly isRateLimited: boolean;
  public readonly isTimeout: boolean;
  constructor(message: string, statusCode?: number, context: ErrorContext = {}) {
    const classification = classifyHttpError(statusCode, message);
    const code = classification.isRateLimited
      ? ErrorCode.PROVIDER_RATE_LIMITED
      : classification.isTimeout
        ? ErrorCode.PROVIDER_TIMEOUT
        : classification.isUnauthorized
          ? ErrorCode.AUTH_PLATFORM_FAILURE
          : ErrorCode.PROVIDER_ERROR;

    const userMessage = classification.isUnauthorized
      ? `Request was not authorized: ${message}. Run "tfmap auth" to sign in again.`
      : `Provider request failed: ${message}`;

    super(
      message,
      code,
      userMessage,
      { ...context, statusCode },
      classification.isRateLimited || classification.isTimeout
    );
    this.name = 'ApiError';
    this.statusCode = statusCode;
    this.isRateLimited = classification.isRateLimited;
    this.isTimeout = classification.isTimeout;
  }

  private static fromProviderError(
    error: unknown,
    provider: string,
    statusExtractor: (err: Error) => number | undefined
  ): ApiError {
    if (error instanceof Error) {
      return new ApiError(error.message, statusExtractor(error), {
        originalError: error.name,
        provider,
      });
    }
    return new ApiError(String(error), undefined, { provider });
  }

  static fromAnthropicError(error: unknown): ApiError {
    return ApiError.fromProviderError(error, 'anthropic', extractStatusCode);
  }

  static fromGeminiError(error: unknown): ApiError {
    return ApiError.fromProviderError(error, 'gemini', (err) => {
      const statusMatch = /(\d{3})/.exec(err.message);
      return statusMatch?.[1] ? parseInt(statusMatch[1], 10) : undefined;
    });
  }

  static fromOpenAIError(error: unknown): ApiError {
    return ApiError.fromProviderError(error, 'openai', extractStatusCode);
  }

  static fromGitHubError(error: unknown): ApiError {
    return ApiError.fromProviderError(error, 'github', extractStatusCode);
  }

  static fromTmiError(error: unknown): ApiError {
    return ApiError.fromProviderError(error, 'tmi', extractStatusCode);
  }
}

/** Structural problem in component data that prevents a diagram from being laid out. */
export class DiagramBuildError extends TfmapError {
  public readonly componentId?: string;
  constructor(message: string, code: ErrorCode, componentId?: string, userMessage?: string) {
    super(message, code, userMessage ?? `Diagram could not be built: ${message}`, {
      componentId,
    });
    this.name = 'DiagramBuildError';
    this.componentId = componentId;
  }
  static cycle(path: string[]): DiagramBuildError {
    return new DiagramBuildError(
      `Containment cycle detected: ${path.join(' -> ')}`,
      ErrorCode.DIAGRAM_CYCLE,
      path[0]
    );
  }
  static unknownParent(componentId: string, parentId: string): DiagramBuildError {
    return new DiagramBuildError(
      `Component "${componentId}" references unknown parent "${parentId}"`,
      ErrorCode.DIAGRAM_INVALID_REFERENCE,
      componentId
    );
  }
}
