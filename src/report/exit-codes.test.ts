import { describe, expect, it } from 'vitest';

import { classifyExitCodes, formatInfraCodes, parseInfraCodes } from './exit-codes';

describe('classifyExitCodes', () => {
  it('separates payload failures from infrastructure failures', () => {
    expect(classifyExitCodes([1, 1, 2, 0, 3, 3])).toEqual({
      pipeErrorCount: 2,
      infraErrorCount: 3,
      infraErrorCodes: '2, 3',
    });
  });

  it('reports nothing for an empty or missing list', () => {
    const none = { pipeErrorCount: 0, infraErrorCount: 0, infraErrorCodes: 'None' };
    expect(classifyExitCodes([])).toEqual(none);
    expect(classifyExitCodes(undefined)).toEqual(none);
  });

  it('reports None when only payload errors occurred', () => {
    expect(classifyExitCodes([0, 1, 0])).toEqual({
      pipeErrorCount: 1,
      infraErrorCount: 0,
      infraErrorCodes: 'None',
    });
  });
});

describe('formatInfraCodes', () => {
  it('sorts codes as strings', () => {
    expect(formatInfraCodes([137, 2, 15, 2])).toBe('137, 15, 2');
  });

  it('reads back the distinct codes', () => {
    expect(parseInfraCodes('137, 15, 2')).toEqual([137, 15, 2]);
    expect(parseInfraCodes('None')).toEqual([]);
  });
});
