import { formatResult, resultError } from './result-format';

describe('formatResult', () => {
  it('should show only non-empty output streams for shell results', () => {
    expect(formatResult({ success: true, returncode: 0, stdout: 'hello\n', stderr: '', command: 'echo hello' }))
      .toEqual(['Output:', 'hello']);
  });

  it('should print nested values as indented JSON', () => {
    expect(formatResult({ count: 1, issues: [{ number: 3 }] })).toEqual([
      'count: 1',
      'issues:',
      '[\n  {\n    "number": 3\n  }\n]'
    ]);
  });

  it('should print strings as they are and other scalars as JSON', () => {
    expect(formatResult('done')).toEqual(['done']);
    expect(formatResult(null)).toEqual(['null']);
    expect(formatResult({ note: 'ok', flag: false })).toEqual(['note: ok', 'flag: false']);
  });
});

describe('resultError', () => {
  it('should return the error message of an error result', () => {
    expect(resultError({ error: 'No repository specified' })).toBe('No repository specified');
  });

  it('should return null for results without an error', () => {
    expect(resultError({ success: true })).toBeNull();
    expect(resultError({ error: null })).toBeNull();
    expect(resultError(['error'])).toBeNull();
  });
});
