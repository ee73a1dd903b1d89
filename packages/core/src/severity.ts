import { Severity } from './types.js';

const SEVERITY_RANK: Record<Severity, number> = {
  [Severity.LOW]: 0,
  [Severity.MEDIUM]: 1,
  [Severity.HIGH]: 2,
  [Severity.CRITICAL]: 3,
};

const SEVERITY_ORDER: readonly Severity[] = [
  Severity.LOW,
  Severity.MEDIUM,
  Severity.HIGH,
  Severity.CRITICAL,
];

/** Negative when `a` is below `b`, zero when equal, positive when above. */
export function compareSeverity(a: Severity, b: Severity): number {
  return SEVERITY_RANK[a] - SEVERITY_RANK[b];
}

export function isHigherSeverity(candidate: Severity, current: Severity): boolean {
  return compareSeverity(candidate, current) > 0;
}

/** One tier up; critical is the ceiling. */
export function nextSeverity(severity: Severity): Severity {
  const next = SEVERITY_ORDER[SEVERITY_RANK[severity] + 1];
  return next ?? Severity.CRITICAL;
}

export function isSeverity(value: unknown): value is Severity {
  return typeof value === 'string' && SEVERITY_ORDER.some((s) => s === value);
}
