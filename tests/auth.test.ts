import { describe, it, expect } from 'vitest';
import { hashApiKey, validateApiKey } from '../src/utils/auth';

describe('Auth utilities', () => {
  describe('hashApiKey', () => {
    it('should produce the sha256 hex digest', () => {
      expect(hashApiKey('test-secret')).toBe('9caf06bb4436cdbfa20af9121a626bc1093c4f54b31c0fa937957856135345b6');
    });

    it('should produce different hashes for different keys', () => {
      expect(hashApiKey('test-secret')).not.toBe(hashApiKey('test-secret-2'));
    });
  });

  describe('validateApiKey', () => {
    const storedHash = hashApiKey('test-secret');

    it('should accept the matching key', () => {
      expect(validateApiKey('test-secret', storedHash)).toBe(true);
    });

    it('should reject a different key', () => {
      expect(validateApiKey('wrong-secret', storedHash)).toBe(false);
    });

    it('should reject when the stored hash is malformed', () => {
      expect(validateApiKey('test-secret', 'abc123')).toBe(false);
    });
  });
});
