import { describe, it, expect } from 'vitest';

import { captureCallSite, parseStackFrame } from './callSite.js';

describe('parseStackFrame', () => {
  it('reads named frames', () => {
    expect(parseStackFrame('    at runBatch (/srv/app/src/batch.ts:41:7)')).toEqual({
      file: '/srv/app/src/batch.ts',
      line: 41,
    });
  });

  it('reads anonymous frames', () => {
    expect(parseStackFrame('    at /srv/app/src/batch.ts:12:3')).toEqual({
      file: '/srv/app/src/batch.ts',
      line: 12,
    });
  });

  it('keeps spaces in paths', () => {
    expect(parseStackFrame('    at check (/home/me/My Tests/counter.test.ts:12:3)')).toEqual({
      file: '/home/me/My Tests/counter.test.ts',
      line: 12,
    });
    expect(parseStackFrame('    at /home/me/My Tests/counter.test.ts:30:9')).toEqual({
      file: '/home/me/My Tests/counter.test.ts',
      line: 30,
    });
  });

  it('turns file URLs into paths', () => {
    expect(parseStackFrame('    at main (file:///srv/app/dist/main.js:5:10)')).toEqual({
      file: '/srv/app/dist/main.js',
      line: 5,
    });
  });

  it('returns an empty site for frames without a location', () => {
    expect(parseStackFrame('    at new Promise (<anonymous>)')).toEqual({});
  });
});

describe('captureCallSite', () => {
  function whereWasICalled(): ReturnType<typeof captureCallSite> {
    return captureCallSite(1);
  }

  it('locates the caller of the capturing function', () => {
    const site = whereWasICalled();
    expect(site.file).toMatch(/callSite\.test\.ts$/);
    expect(site.line).toEqual(expect.any(Number));
  });
});
