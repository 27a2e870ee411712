/**
 * Error handling utilities for pbxnav
 * Setup failures are fatal; problems met while walking the tree are warnings
 */

/**
 * Error codes for different failure scenarios
 */
export type ErrorCode =
  | 'PROJECT_NOT_FOUND' // No .xcodeproj bundle or project.pbxproj
  | 'PARSE_ERROR'       // project.pbxproj is not a valid property list
  | 'INVALID_PROJECT'   // Root object or main group missing or malformed
  | 'CONFIG_ERROR'      // pbxnav.config.json is invalid
  | 'SCAN_ERROR'        // A directory could not be listed
  | 'MISSING_OBJECT'    // A child identifier has no object
  | 'CYCLE';            // A group or linked directory contains its own ancestor

/**
 * Error severity levels: fatal errors stop the run, warnings are collected
 */
export type ErrorSeverity = 'fatal' | 'warning';

/**
 * Custom error class with structured information
 */
export class NavError extends Error {
  code: ErrorCode;
  severity: ErrorSeverity;
  suggestion?: string;

  constructor(
    code: ErrorCode,
    message: string,
    severity: ErrorSeverity = 'fatal',
    suggestion?: string
  ) {
    super(message);
    this.name = 'NavError';
    this.code = code;
    this.severity = severity;
    this.suggestion = suggestion;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, NavError);
    }
  }
}

/**
 * Format an error for display on the terminal
 * @param error - The error to format
 * @returns Formatted error string
 */
export function formatError(error: Error | NavError): string {
  const isNavError = error instanceof NavError;

  let label = 'Error';
  if (isNavError) {
    label = error.severity === 'fatal' ? 'Fatal' : 'Warning';
  }

  let formatted = `${label}: ${error.message}`;

  if (isNavError) {
    formatted += `\n  Type: ${error.code}`;
    if (error.suggestion) {
      formatted += `\n  Suggestion: ${error.suggestion}`;
    }
  }

  return formatted;
}

/**
 * Get a helpful suggestion for a given error code
 * @param code - The error code
 * @returns Suggestion text
 */
export function getSuggestion(code: ErrorCode): string {
  const suggestions: Record<ErrorCode, string> = {
    PROJECT_NOT_FOUND:
      'Pass the path of an .xcodeproj bundle, or a directory that contains one.',
    PARSE_ERROR: 'Check project.pbxproj for merge conflict markers or truncated content.',
    INVALID_PROJECT: 'Open the project in Xcode and save it to rewrite project.pbxproj.',
    CONFIG_ERROR: 'Check your pbxnav.config.json file against the documented fields.',
    SCAN_ERROR: 'Verify the directory exists and you have permission to read it.',
    MISSING_OBJECT: 'The project references an object it does not define; re-save it in Xcode.',
    CYCLE: 'A group or symlinked directory contains itself; it is shown but not entered.',
  };

  return suggestions[code] || 'Please check the error message for details.';
}
