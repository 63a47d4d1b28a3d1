/**
 * Tests for template digest calculation
 */

import { describe, it, expect } from 'vitest';
import { calculateTemplateDigest, normalizeTemplateForDigest } from './digest.js';
import type { TemplateDefinition } from './schema.js';

describe('normalizeTemplateForDigest', () => {
  it('should emit every rule field in a fixed order', () => {
    expect(normalizeTemplateForDigest({ version: 1 })).toBe(
      '{"version":1,"fallback_date":null,"date_headers":null,"date_labels":null,' +
      '"break_keywords":null,"skip_patterns":null,"section_start":null,"title":null,"limits":null}'
    );
  });

  it('should not depend on property order', () => {
    const a: TemplateDefinition = { version: 1, break_keywords: ['lunch'], fallback_date: 'TBD' };
    const b = JSON.parse('{"fallback_date":"TBD","break_keywords":["lunch"],"version":1}') as TemplateDefinition;
    expect(normalizeTemplateForDigest(a)).toBe(normalizeTemplateForDigest(b));
  });
});

describe('calculateTemplateDigest', () => {
  it('should return a 64-char hex string', () => {
    expect(calculateTemplateDigest({ version: 1 })).toMatch(/^[0-9a-f]{64}$/);
  });

  it('should ignore name and description', () => {
    const base: TemplateDefinition = { version: 1, break_keywords: ['lunch'] };
    expect(calculateTemplateDigest({ ...base, name: 'a', description: 'first' })).toBe(
      calculateTemplateDigest({ ...base, name: 'b', description: 'second' })
    );
  });

  it('should change when a rule changes', () => {
    expect(calculateTemplateDigest({ version: 1, break_keywords: ['lunch'] })).not.toBe(
      calculateTemplateDigest({ version: 1, break_keywords: ['lunch', 'tea'] })
    );
  });
});
