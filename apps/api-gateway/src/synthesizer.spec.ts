import { compareFindings, deduplicate, isDuplicate, synthesize } from './synthesizer.js';
import { makeFinding } from './testing/fakes.js';

describe('isDuplicate', () => {
  const base = makeFinding({ file: 'a.ts', category: 'logic', line: 10, endLine: 12 });

  it('matches overlapping ranges in the same file and category', () => {
    expect(isDuplicate(base, makeFinding({ file: 'a.ts', category: 'logic', line: 12 }))).toBe(true);
    expect(isDuplicate(base, makeFinding({ file: 'a.ts', category: 'logic', line: 5, endLine: 10 }))).toBe(true);
  });

  it('keeps adjacent but disjoint ranges apart', () => {
    expect(isDuplicate(base, makeFinding({ file: 'a.ts', category: 'logic', line: 13 }))).toBe(false);
  });

  it('keeps different categories and files apart', () => {
    expect(isDuplicate(base, makeFinding({ file: 'a.ts', category: 'style', line: 10 }))).toBe(false);
    expect(isDuplicate(base, makeFinding({ file: 'b.ts', category: 'logic', line: 10 }))).toBe(false);
  });
});

describe('deduplicate', () => {
  it('keeps the higher severity of two overlapping findings', () => {
    const medium = makeFinding({ agentName: 'logic', severity: 'medium', category: 'correctness', line: 20, endLine: 24 });
    const high = makeFinding({ agentName: 'logic', severity: 'high', category: 'correctness', line: 22, endLine: 22 });

    expect(deduplicate([medium, high])).toEqual([high]);
    expect(deduplicate([high, medium])).toEqual([high]);
  });

  it('breaks severity ties by agent priority', () => {
    const style = makeFinding({ agentName: 'style', severity: 'low', category: 'naming', line: 3 });
    const security = makeFinding({ agentName: 'security', severity: 'low', category: 'naming', line: 3 });
    const performance = makeFinding({ agentName: 'performance', severity: 'low', category: 'naming', line: 3 });

    expect(deduplicate([style, performance, security])).toEqual([security]);
  });

  it('does not chain through a dropped finding', () => {
    // b overlaps both, but a outranks b, so c survives
    const a = makeFinding({ severity: 'high', line: 1, endLine: 5 });
    const b = makeFinding({ severity: 'medium', line: 5, endLine: 10 });
    const c = makeFinding({ severity: 'low', line: 8, endLine: 12 });

    expect(deduplicate([c, b, a])).toEqual([a, c]);
  });
});

describe('synthesize', () => {
  it('passes through a single high security finding', () => {
    const finding = makeFinding({
      agentName: 'security',
      severity: 'high',
      file: 'app.py',
      line: 12,
      category: 'security',
      message: 'SQL built from user input',
    });

    const report = synthesize([finding]);

    expect(report).toEqual({
      findings: [finding],
      issuesFound: 1,
      issuesByType: { security: 1, style: 0, performance: 0, logic: 0 },
      omittedCount: 0,
    });
  });

  it('keeps only the high of an overlapping medium and high in one category', () => {
    const medium = makeFinding({ agentName: 'performance', severity: 'medium', category: 'loops', line: 40, endLine: 45 });
    const high = makeFinding({ agentName: 'logic', severity: 'high', category: 'loops', line: 44 });

    const report = synthesize([medium, high]);

    expect(report.findings).toEqual([high]);
    expect(report.issuesByType).toEqual({ security: 0, style: 0, performance: 0, logic: 1 });
  });

  it('orders by severity, then file, then line, then agent', () => {
    const f1 = makeFinding({ severity: 'low', file: 'a.ts', line: 1, category: 'x' });
    const f2 = makeFinding({ severity: 'high', file: 'b.ts', line: 9, category: 'x' });
    const f3 = makeFinding({ severity: 'high', file: 'a.ts', line: 30, category: 'x' });
    const f4 = makeFinding({ severity: 'high', file: 'a.ts', line: 2, category: 'y', agentName: 'style' });
    const f5 = makeFinding({ severity: 'high', file: 'a.ts', line: 2, category: 'z', agentName: 'logic' });

    expect(synthesize([f1, f2, f3, f4, f5]).findings).toEqual([f5, f4, f3, f2, f1]);
  });

  it('caps the report but counts the full deduplicated set', () => {
    const findings = Array.from({ length: 7 }, (_, i) =>
      makeFinding({ agentName: i % 2 ? 'style' : 'security', line: i * 10, category: `c${i}` }),
    );

    const report = synthesize(findings, 5);

    expect(report.findings).toHaveLength(5);
    expect(report.findings.map((f) => f.line)).toEqual([0, 10, 20, 30, 40]);
    expect(report.issuesFound).toBe(7);
    expect(report.omittedCount).toBe(2);
    expect(report.issuesByType).toEqual({ security: 4, style: 3, performance: 0, logic: 0 });
  });

  it('handles no findings', () => {
    expect(synthesize([])).toEqual({
      findings: [],
      issuesFound: 0,
      issuesByType: { security: 0, style: 0, performance: 0, logic: 0 },
      omittedCount: 0,
    });
  });
});

describe('compareFindings', () => {
  it('only returns 0 for identical findings', () => {
    const a = makeFinding({ message: 'a' });
    const b = makeFinding({ message: 'b' });
    expect(compareFindings(a, b)).toBeLessThan(0);
    expect(compareFindings(a, { ...a })).toBe(0);
  });
});
