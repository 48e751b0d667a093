import { describe, it, expect } from 'vitest';
import { generateJobId } from '../utils/id.js';

describe('generateJobId', () => {
  it('has a job_ prefix, a YYYYMMDD date and a 6-char hex suffix', () => {
    expect(generateJobId()).toMatch(/^job_\d{8}_[a-f0-9]{6}$/);
  });

  it('uses the given date', () => {
    expect(generateJobId(new Date('2024-03-09T12:00:00Z'))).toMatch(/^job_20240309_/);
  });

  it('generates unique IDs', () => {
    const ids = new Set(Array.from({ length: 50 }, () => generateJobId()));
    expect(ids.size).toBe(50);
  });
});
