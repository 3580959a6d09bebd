// Unit tests for invocation input validation

import { describe, it, expect } from 'vitest';
import { validateCity, validateClientId, validateResearchRecordId } from '../../../src/orchestrator/validation.js';

describe('validation', () => {
  describe('validateCity', () => {
    it('accepts straight and typographic apostrophes', () => {
      expect(validateCity("Coeur d'Alene")).toBe("Coeur d'Alene");
      expect(validateCity('Coeur d’Alene')).toBe('Coeur d’Alene');
    });

    it('trims and keeps state suffixes', () => {
      expect(validateCity('  St. Louis, MO ')).toBe('St. Louis, MO');
    });

    it('rejects cities that do not start with a letter', () => {
      expect(() => validateCity('12345')).toThrow('Invalid city "12345"');
    });
  });

  describe('validateClientId', () => {
    it('rejects punctuation', () => {
      expect(validateClientId(' acme-hauling ')).toBe('acme-hauling');
      expect(() => validateClientId('acme!')).toThrow('Invalid client id "acme!"');
    });
  });

  describe('validateResearchRecordId', () => {
    it('requires a UUID', () => {
      expect(() => validateResearchRecordId('not-a-uuid')).toThrow('research record id must be a UUID');
    });
  });
});
