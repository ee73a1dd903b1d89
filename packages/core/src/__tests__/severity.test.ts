import { describe, it, expect } from 'vitest';
import { Severity } from '../types.js';
import { compareSeverity, isHigherSeverity, isSeverity, nextSeverity } from '../severity.js';

describe('severity ordering', () => {
  it('orders low < medium < high < critical', () => {
    expect(compareSeverity(Severity.LOW, Severity.MEDIUM)).toBeLessThan(0);
    expect(compareSeverity(Severity.MEDIUM, Severity.HIGH)).toBeLessThan(0);
    expect(compareSeverity(Severity.HIGH, Severity.CRITICAL)).toBeLessThan(0);
    expect(compareSeverity(Severity.CRITICAL, Severity.LOW)).toBeGreaterThan(0);
    expect(compareSeverity(Severity.HIGH, Severity.HIGH)).toBe(0);
  });

  it('isHigherSeverity is strict', () => {
    expect(isHigherSeverity(Severity.HIGH, Severity.MEDIUM)).toBe(true);
    expect(isHigherSeverity(Severity.HIGH, Severity.HIGH)).toBe(false);
    expect(isHigherSeverity(Severity.LOW, Severity.HIGH)).toBe(false);
  });

  it('nextSeverity raises one tier and caps at critical', () => {
    expect(nextSeverity(Severity.LOW)).toBe(Severity.MEDIUM);
    expect(nextSeverity(Severity.MEDIUM)).toBe(Severity.HIGH);
    expect(nextSeverity(Severity.HIGH)).toBe(Severity.CRITICAL);
    expect(nextSeverity(Severity.CRITICAL)).toBe(Severity.CRITICAL);
  });

  it('isSeverity accepts only known values', () => {
    expect(isSeverity('medium')).toBe(true);
    expect(isSeverity('MEDIUM')).toBe(false);
    expect(isSeverity(2)).toBe(false);
    expect(isSeverity(undefined)).toBe(false);
  });
});
