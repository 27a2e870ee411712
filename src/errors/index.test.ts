import { describe, it } from 'node:test';
import assert from 'node:assert';
import {
  NavError,
  formatError,
  getSuggestion,
  type ErrorCode,
} from './index.ts';

describe('NavError', () => {
  it('creates error with all properties', () => {
    const error = new NavError(
      'PARSE_ERROR',
      'Unexpected "}" at line 4, column 2',
      'fatal',
      'Check the file'
    );

    assert.strictEqual(error.code, 'PARSE_ERROR');
    assert.strictEqual(error.message, 'Unexpected "}" at line 4, column 2');
    assert.strictEqual(error.severity, 'fatal');
    assert.strictEqual(error.suggestion, 'Check the file');
    assert.strictEqual(error.name, 'NavError');
    assert.ok(error instanceof Error);
  });

  it('is fatal unless raised as a warning', () => {
    const error = new NavError('CONFIG_ERROR', 'Invalid config');

    assert.strictEqual(error.severity, 'fatal');
    assert.strictEqual(error.suggestion, undefined);
  });
});

describe('formatError', () => {
  it('formats fatal error with suggestion', () => {
    const error = new NavError(
      'PROJECT_NOT_FOUND',
      'No .xcodeproj found in /tmp/app',
      'fatal',
      'Pass a bundle path'
    );

    assert.strictEqual(
      formatError(error),
      'Fatal: No .xcodeproj found in /tmp/app\n  Type: PROJECT_NOT_FOUND\n  Suggestion: Pass a bundle path'
    );
  });

  it('formats warning without suggestion', () => {
    const error = new NavError('SCAN_ERROR', 'Cannot list /tmp/app/Locked', 'warning');

    assert.strictEqual(formatError(error), 'Warning: Cannot list /tmp/app/Locked\n  Type: SCAN_ERROR');
  });

  it('formats standard Error objects', () => {
    const formatted = formatError(new Error('Standard error message'));

    assert.strictEqual(formatted, 'Error: Standard error message');
  });
});

describe('getSuggestion', () => {
  it('suggests an .xcodeproj path for PROJECT_NOT_FOUND', () => {
    assert.ok(getSuggestion('PROJECT_NOT_FOUND').includes('.xcodeproj'));
  });

  it('mentions the config file for CONFIG_ERROR', () => {
    assert.ok(getSuggestion('CONFIG_ERROR').includes('pbxnav.config.json'));
  });

  it('returns generic suggestion for unknown error code', () => {
    const suggestion = getSuggestion('UNKNOWN_ERROR' as ErrorCode);
    assert.strictEqual(suggestion, 'Please check the error message for details.');
  });
});
