/**
 * Tests for the pipeline error taxonomy and timed capability calls
 */

import { describe, it, expect, vi, afterEach } from 'vitest';
import {
  RAGError,
  RAGErrorCode,
  Capability,
  ConfigurationError,
  TransientProviderError,
  DataError,
  QueryCancelledError,
  callCapability,
  isConfigurationError,
  isRAGError,
  isTransientProviderError,
} from '../../lib/src/errors/index.js';

describe('RAGError', () => {
  it('should wrap unknown errors', () => {
    const error = RAGError.fromError(new Error('boom'), RAGErrorCode.DATA_ERROR, { id: 1 });

    expect(error.code).toBe(RAGErrorCode.DATA_ERROR);
    expect(error.message).toBe('boom');
    expect(error.cause?.message).toBe('boom');
    expect(error.metadata).toEqual({ id: 1 });
  });

  it('should return RAGError instances unchanged', () => {
    const original = new DataError('bad chunk id');

    expect(RAGError.fromError(original)).toBe(original);
  });

  it('should default to UNKNOWN for non-errors', () => {
    expect(RAGError.fromError('text').code).toBe(RAGErrorCode.UNKNOWN);
  });
});

describe('subclasses', () => {
  it('should set names and codes', () => {
    const config = new ConfigurationError('invalid', { issues: ['llm.defaultProvider: Required'] });
    const cancelled = new QueryCancelledError();

    expect(config.name).toBe('ConfigurationError');
    expect(config.code).toBe(RAGErrorCode.CONFIGURATION_ERROR);
    expect(config.issues).toEqual(['llm.defaultProvider: Required']);
    expect(cancelled.code).toBe(RAGErrorCode.CANCELLED);
    expect(isRAGError(cancelled)).toBe(true);
    expect(isConfigurationError(config)).toBe(true);
    expect(isConfigurationError(cancelled)).toBe(false);
  });

  it('should use TIMEOUT code for timed out provider calls', () => {
    const error = new TransientProviderError('slow', Capability.LLM, { timedOut: true });

    expect(error.code).toBe(RAGErrorCode.TIMEOUT);
    expect(error.capability).toBe('llm');
    expect(isTransientProviderError(error)).toBe(true);
  });
});

describe('callCapability', () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  it('should resolve ok with the value', async () => {
    const result = await callCapability(async () => [0.1, 0.2], {
      capability: Capability.EMBEDDING,
      timeoutMs: 1000,
    });

    expect(result.ok).toBe(true);
    if (result.ok) {
      expect(result.value).toEqual([0.1, 0.2]);
    }
  });

  it('should convert rejections into transient provider errors', async () => {
    const result = await callCapability(
      async () => {
        throw new Error('503 Service Unavailable');
      },
      { capability: Capability.VECTOR_STORE, timeoutMs: 1000 }
    );

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error).toBeInstanceOf(TransientProviderError);
      expect(result.error.capability).toBe('vector_store');
      expect(result.error.message).toBe('503 Service Unavailable');
      expect(result.error.timedOut).toBe(false);
    }
  });

  it('should convert synchronous throws', async () => {
    const result = await callCapability(
      () => {
        throw new Error('sync');
      },
      { capability: Capability.LLM, timeoutMs: 1000 }
    );

    expect(result.ok).toBe(false);
  });

  it('should time out slow calls', async () => {
    vi.useFakeTimers();
    const pending = callCapability(() => new Promise<string>(() => {}), {
      capability: Capability.LLM,
      timeoutMs: 60000,
    });

    await vi.advanceTimersByTimeAsync(60000);
    const result = await pending;

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.timedOut).toBe(true);
      expect(result.error.message).toBe('llm call timed out after 60000ms');
    }
  });
});
