// ============================================================================
// HARVEST ERROR TYPES
// ============================================================================
// Categorized errors for per-item failure handling and retry decisions

/**
 * Categories of harvesting errors with different handling strategies
 */
export enum HarvestErrorType {
  /** Network-related errors (connection, DNS, etc.) - retriable */
  NETWORK = 'network',
  /** Timeout errors (navigation, loading) - retriable */
  TIMEOUT = 'timeout',
  /** Navigation errors (page load, redirect issues) - retriable */
  NAVIGATION = 'navigation',
  /** Selector errors (invalid selector, detached element) - not retriable */
  SELECTOR = 'selector',
  /** No strategy matched, or extraction broke - not retriable */
  EXTRACTION = 'extraction',
  /** Loading stagnated under the active policy - not retriable */
  LOAD = 'load',
  /** Configuration errors (invalid config) - not retriable */
  CONFIG = 'config',
  /** Unknown/unexpected errors */
  UNKNOWN = 'unknown',
}

/**
 * Structured error with metadata for handling decisions
 */
export interface HarvestError {
  type: HarvestErrorType;
  message: string;
  retriable: boolean;
  cause?: Error;
  /** Item being processed when the error occurred */
  itemId?: string;
  timestamp: number;
}

/**
 * Raised when the load phase ends without enough content for the active policy
 */
export class LoadStagnationError extends Error {
  constructor(
    message: string,
    readonly finalCount: number,
    readonly iterations: number
  ) {
    super(message);
    this.name = 'LoadStagnationError';
  }
}

/**
 * Raised when no strategy matches any container on the page
 */
export class NoContainersError extends Error {
  constructor() {
    super('No containers found for any selector strategy');
    this.name = 'NoContainersError';
  }
}

/**
 * Raised for invalid configuration values
 */
export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

/**
 * Configuration for retry behavior
 */
export interface RetryConfig {
  /** Maximum number of retry attempts */
  maxRetries: number;
  /** Delay before the first retry in ms */
  retryDelay: number;
  /** Multiplier for exponential backoff */
  backoffMultiplier: number;
  /** Maximum delay cap in ms */
  maxDelay: number;
  /** Which error types to retry */
  retriableTypes: HarvestErrorType[];
}

export const DEFAULT_RETRY_CONFIG: RetryConfig = {
  maxRetries: 0, // Failed is terminal unless retries are configured
  retryDelay: 5000,
  backoffMultiplier: 2,
  maxDelay: 60000,
  retriableTypes: [
    HarvestErrorType.NETWORK,
    HarvestErrorType.TIMEOUT,
    HarvestErrorType.NAVIGATION,
  ],
};

export function isRetriable(errorType: HarvestErrorType, config: RetryConfig = DEFAULT_RETRY_CONFIG): boolean {
  return config.retriableTypes.includes(errorType);
}

/**
 * Calculate delay for retry attempt with exponential backoff
 */
export function calculateRetryDelay(attempt: number, config: RetryConfig = DEFAULT_RETRY_CONFIG): number {
  const delay = config.retryDelay * Math.pow(config.backoffMultiplier, attempt);
  return Math.min(delay, config.maxDelay);
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Classify an error into a HarvestErrorType based on its class or message
 */
export function classifyError(error: unknown): HarvestErrorType {
  if (error instanceof LoadStagnationError) return HarvestErrorType.LOAD;
  if (error instanceof ConfigError) return HarvestErrorType.CONFIG;
  if (error instanceof NoContainersError) return HarvestErrorType.EXTRACTION;

  const message = errorMessage(error).toLowerCase();

  // Network errors
  if (
    message.includes('net::') ||
    message.includes('econnrefused') ||
    message.includes('enotfound') ||
    message.includes('network') ||
    message.includes('connection')
  ) {
    return HarvestErrorType.NETWORK;
  }

  // Timeout errors
  if (
    message.includes('timeout') ||
    message.includes('timed out') ||
    message.includes('exceeded')
  ) {
    return HarvestErrorType.TIMEOUT;
  }

  // Navigation errors
  if (
    message.includes('navigation') ||
    message.includes('navigate') ||
    message.includes('page.goto')
  ) {
    return HarvestErrorType.NAVIGATION;
  }

  // Extraction errors
  if (
    message.includes('extract') ||
    message.includes('no containers found')
  ) {
    return HarvestErrorType.EXTRACTION;
  }

  // Selector errors
  if (
    message.includes('selector') ||
    message.includes('not attached') ||
    message.includes('element is detached')
  ) {
    return HarvestErrorType.SELECTOR;
  }

  return HarvestErrorType.UNKNOWN;
}

/**
 * Create a HarvestError with automatic classification
 */
export function wrapError(
  error: unknown,
  context: Partial<Pick<HarvestError, 'itemId'>> = {},
  config: RetryConfig = DEFAULT_RETRY_CONFIG
): HarvestError {
  const type = classifyError(error);
  return {
    type,
    message: errorMessage(error),
    retriable: isRetriable(type, config),
    cause: error instanceof Error ? error : undefined,
    timestamp: Date.now(),
    ...context,
  };
}
