import { describe, expect, it } from 'vitest';

import { describeVerification, verifyOutput } from '../src/core/index.js';
import { verificationSpecSchema } from '../src/schema/index.js';

const spec = (type: string, value?: string) => verificationSpecSchema.parse({ type, value });

describe('verifyOutput', () => {
  it('passes when the node has no verification', () => {
    expect(verifyOutput(undefined, '')).toBe(true);
  });

  it('matches output_contains case-insensitively', () => {
    expect(verifyOutput(spec('output_contains', 'Passed'), '12 tests PASSED')).toBe(true);
    expect(verifyOutput(spec('output_contains', 'passed'), '3 failed')).toBe(false);
  });

  it('inverts the check for output_not_contains', () => {
    expect(verifyOutput(spec('output_not_contains', 'FAIL'), 'all green')).toBe(true);
    expect(verifyOutput(spec('output_not_contains', 'fail'), '1 Failure')).toBe(false);
  });

  it('treats error text or an exit code mention as a non-zero exit', () => {
    const exitZero = spec('exit_code_zero');
    expect(verifyOutput(exitZero, 'Compiled successfully')).toBe(true);
    expect(verifyOutput(exitZero, 'TypeError: x is undefined')).toBe(false);
    expect(verifyOutput(exitZero, 'Process finished with Exit Code 2')).toBe(false);
  });

  it('requires non-whitespace output for any_output', () => {
    expect(verifyOutput(spec('any_output'), ' ok ')).toBe(true);
    expect(verifyOutput(spec('any_output'), '  \n\t')).toBe(false);
  });

  it('assumes file_exists and manual checks pass unless confirmation is required', () => {
    expect(verifyOutput(spec('file_exists', 'out.txt'), '')).toBe(true);
    expect(verifyOutput(spec('manual'), '', { confirmation: 'assume' })).toBe(true);
    expect(verifyOutput(spec('manual'), '', { confirmation: 'require' })).toBe(false);
    expect(verifyOutput(spec('file_exists'), '', { confirmation: 'require', confirmed: true })).toBe(true);
  });
});

describe('describeVerification', () => {
  it('includes the value only when there is one', () => {
    expect(describeVerification(spec('output_contains', 'passed'))).toBe('output_contains: passed');
    expect(describeVerification(spec('any_output'))).toBe('any_output');
  });
});
