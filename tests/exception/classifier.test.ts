import { describe, it, expect } from 'vitest';
import { classifyError, retryAfterOf } from '../../src/exception/classifier.js';
import {
  ConfigError,
  ElementNotFoundError,
  FatalError,
  NavigationError,
  RateLimitError,
  ReasonerError,
  ValidationError,
} from '../../src/exception/errors.js';

describe('classifyError', () => {
  describe('errors of this package', () => {
    it.each([
      [new ValidationError('bad output'), 'validation'],
      [new ElementNotFoundError(3), 'element_not_found'],
      [new NavigationError('timed out', 'timeout'), 'transient'],
      [new RateLimitError('slow down', 2000), 'rate_limit'],
      [new ReasonerError('502 from upstream', true, 502), 'transient'],
      [new ReasonerError('401 unauthorized', false, 401), 'fatal'],
      [new FatalError('browser gone'), 'fatal'],
      [new ConfigError('bad config'), 'fatal'],
    ])('%s is %s', (error, kind) => {
      expect(classifyError(error)).toBe(kind);
    });
  });

  describe('foreign errors', () => {
    it('detects rate limits', () => {
      expect(classifyError(new Error('429 Too Many Requests'))).toBe('rate_limit');
      expect(classifyError(new Error('RESOURCE_EXHAUSTED: quota'))).toBe('rate_limit');
    });

    it('detects transient browser and network failures', () => {
      expect(classifyError(new Error('Timeout 30000ms exceeded.'))).toBe('transient');
      expect(classifyError(new Error('page.goto: net::ERR_CONNECTION_RESET'))).toBe('transient');
      expect(classifyError(new Error('Target page, context or browser has been closed'))).toBe('transient');
      const abort = new Error('This operation was aborted');
      abort.name = 'AbortError';
      expect(classifyError(abort)).toBe('transient');
    });

    it('detects elements the browser could not act on', () => {
      expect(classifyError(new Error('<div class="overlay"> intercepts pointer events'))).toBe('action_failed');
      expect(classifyError(new Error('Element is not enabled'))).toBe('action_failed');
      expect(classifyError(new Error('strict mode violation: locator resolved to 2 elements'))).toBe('action_failed');
    });

    it('treats parse errors as validation', () => {
      expect(classifyError(new SyntaxError('Unexpected token } in JSON'))).toBe('validation');
    });

    it('treats anything else as fatal', () => {
      expect(classifyError(new Error('something odd'))).toBe('fatal');
      expect(classifyError('a string')).toBe('fatal');
      expect(classifyError(undefined)).toBe('fatal');
    });
  });
});

describe('retryAfterOf', () => {
  it('reads the delay of a rate limit', () => {
    expect(retryAfterOf(new RateLimitError('slow', 1500))).toBe(1500);
    expect(retryAfterOf(new Error('429'))).toBeUndefined();
  });
});
