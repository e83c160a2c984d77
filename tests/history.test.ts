import { describe, expect, it } from 'vitest';

import { lastToolOutput, lastUserMessage } from '../src/core/index.js';
import type { TurnRecord } from '../src/schema/index.js';

const turns: TurnRecord[] = [
  { role: 'user', content: 'First question' },
  { role: 'tool', toolName: 'shell', output: 'old output' },
  { role: 'user', content: '  Fix the Failing Build  ' },
  { role: 'assistant', content: 'Running the build' },
  { role: 'tool', toolName: 'shell', output: '' },
  { role: 'assistant', content: 'Done' },
];

describe('lastUserMessage', () => {
  it('returns the latest user message trimmed and lower-cased', () => {
    expect(lastUserMessage(turns)).toBe('fix the failing build');
  });

  it('returns an empty string without user turns', () => {
    expect(lastUserMessage([{ role: 'assistant', content: 'hi' }])).toBe('');
  });
});

describe('lastToolOutput', () => {
  it('returns the latest tool output, even when empty', () => {
    expect(lastToolOutput(turns)).toBe('');
  });

  it('returns undefined when no tool has run', () => {
    expect(lastToolOutput(turns.slice(0, 1))).toBeUndefined();
  });
});
