import { describe, it, expect } from 'vitest';
import { ConfigurationError } from '@agora/shared/src/utils/errors.js';
import { memoryBackendFrom } from './bootstrap.js';

describe('memoryBackendFrom', () => {
  it('should default to in-memory storage', () => {
    expect(memoryBackendFrom({})).toBe('memory');
  });

  it('should select Firestore when asked', () => {
    expect(memoryBackendFrom({ AGORA_MEMORY: 'firestore' })).toBe('firestore');
  });

  it('should reject an unknown backend', () => {
    expect(() => memoryBackendFrom({ AGORA_MEMORY: 'redis' })).toThrow(ConfigurationError);
  });
});
