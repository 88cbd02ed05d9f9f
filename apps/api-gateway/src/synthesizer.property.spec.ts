import * as fc from 'fast-check';
import { AGENT_NAMES, SEVERITIES } from './types.js';
import type { Finding } from './types.js';
import { synthesize } from './synthesizer.js';

const findingArb: fc.Arbitrary<Finding> = fc
  .record({
    agentName: fc.constantFrom(...AGENT_NAMES),
    severity: fc.constantFrom(...SEVERITIES),
    file: fc.constantFrom('a.ts', 'b.ts', 'lib/c.py'),
    line: fc.integer({ min: 1, max: 40 }),
    span: fc.integer({ min: 0, max: 5 }),
    message: fc.constantFrom('unchecked input', 'slow loop', 'bad name', 'off by one'),
    category: fc.constantFrom('security', 'logic', 'style', 'performance', 'naming'),
  })
  .map(({ span, ...f }) => ({ ...f, endLine: f.line + span }));

describe('synthesize properties', () => {
  it('does not depend on input order', () => {
    fc.assert(
      fc.property(
        fc.array(findingArb, { maxLength: 60 }).chain((findings) =>
          fc.tuple(fc.constant(findings), fc.shuffledSubarray(findings, { minLength: findings.length })),
        ),
        ([findings, shuffled]) => {
          expect(synthesize(shuffled)).toEqual(synthesize(findings));
        },
      ),
      { numRuns: 200 },
    );
  });

  it('counts per agent add up to issuesFound', () => {
    fc.assert(
      fc.property(fc.array(findingArb, { maxLength: 120 }), fc.integer({ min: 1, max: 60 }), (findings, cap) => {
        const report = synthesize(findings, cap);
        const sum = Object.values(report.issuesByType).reduce((a, b) => a + b, 0);
        expect(sum).toBe(report.issuesFound);
        expect(report.findings.length + report.omittedCount).toBe(report.issuesFound);
        expect(report.findings.length).toBeLessThanOrEqual(cap);
      }),
      { numRuns: 200 },
    );
  });

  it('is idempotent on its own output', () => {
    // at most the default cap, so nothing is omitted on the first pass
    fc.assert(
      fc.property(fc.array(findingArb, { maxLength: 50 }), (findings) => {
        const once = synthesize(findings);
        expect(synthesize(once.findings)).toEqual(once);
      }),
      { numRuns: 200 },
    );
  });
});
