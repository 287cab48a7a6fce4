/**
 * Error Taxonomy - Human-readable error messages and recommendations
 *
 * Maps internal error codes to operator-facing messages with actionable suggestions.
 */

import type { ErrorCode } from './domain';

export interface ErrorInfo {
  title: string;
  description: string;
  recommendation: string;
  severity: 'info' | 'warning' | 'error' | 'critical';
  retryable: boolean;
}

/**
 * Error taxonomy mapping
 */
export const ERROR_TAXONOMY: Record<ErrorCode, ErrorInfo> = {
  // Extraction
  SELECTOR_MISS: {
    title: 'Selector Miss',
    description: 'A selector found nothing and the next fallback was tried.',
    recommendation: 'No action needed unless every selector of a field misses.',
    severity: 'info',
    retryable: false,
  },
  FIELD_ABSENT: {
    title: 'Field Not Found',
    description: 'No selector of a required field produced a value.',
    recommendation: 'The page layout may have changed. Regenerate the pattern.',
    severity: 'error',
    retryable: false,
  },
  FORMAT_INVALID: {
    title: 'Invalid Value',
    description: 'A field was found but its value is malformed.',
    recommendation: 'Check that the selector points at the right element.',
    severity: 'error',
    retryable: false,
  },

  // Validation
  ANOMALOUS_CHANGE: {
    title: 'Suspicious Change',
    description: 'The value differs sharply from the last known-good extraction.',
    recommendation: 'Verify the product page manually.',
    severity: 'warning',
    retryable: false,
  },
  CONFIDENCE_BELOW_THRESHOLD: {
    title: 'Low Confidence',
    description: 'The extraction confidence is below the configured minimum.',
    recommendation: 'Add higher-confidence selectors to the pattern.',
    severity: 'error',
    retryable: false,
  },

  // Patterns and storage
  PATTERN_NOT_FOUND: {
    title: 'No Pattern',
    description: 'No extraction pattern exists for this domain.',
    recommendation: 'Author a pattern for the domain.',
    severity: 'error',
    retryable: false,
  },
  PATTERN_RECORD_INVALID: {
    title: 'Invalid Pattern',
    description: 'The stored pattern record failed schema validation.',
    recommendation: 'Re-import the pattern from the authoring workflow.',
    severity: 'critical',
    retryable: false,
  },
  PERSISTENCE_FAILED: {
    title: 'Storage Error',
    description: 'The pattern store or price history could not be written.',
    recommendation: 'Check the storage connection. The attempt can be retried.',
    severity: 'critical',
    retryable: true,
  },
};

function isErrorCode(code: string): code is ErrorCode {
  return Object.prototype.hasOwnProperty.call(ERROR_TAXONOMY, code);
}

/**
 * Get error info for an error code
 */
export function getErrorInfo(errorCode: string | null): ErrorInfo | null {
  if (!errorCode) return null;
  if (isErrorCode(errorCode)) {
    return ERROR_TAXONOMY[errorCode];
  }
  return {
    title: 'Unknown Error',
    description: `Error: ${errorCode}`,
    recommendation: 'Check the worker logs if this persists.',
    severity: 'warning',
    retryable: true,
  };
}

/**
 * Get operator-facing error message
 */
export function getErrorMessage(errorCode: string | null): string {
  const info = getErrorInfo(errorCode);
  if (!info) return '';
  return `${info.title}: ${info.description}`;
}
