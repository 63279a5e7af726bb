/**
 * CLI Tests: argument parsing
 */

import { describe, expect, it } from 'vitest';
import { parseParseArgs } from '../../src/cli-parse.js';

describe('parseParseArgs', () => {
  it('takes a path', () => {
    expect(parseParseArgs(['scripts'])).toEqual({
      mode: 'parse',
      path: 'scripts',
      format: undefined,
    });
  });

  it('takes a format in either position', () => {
    expect(parseParseArgs(['--format', 'json', 'a.gd'])).toEqual({
      mode: 'parse',
      path: 'a.gd',
      format: 'json',
    });
    expect(parseParseArgs(['a.gd', '--format', 'debug'])).toEqual({
      mode: 'parse',
      path: 'a.gd',
      format: 'debug',
    });
  });

  it('prefers help and version over everything else', () => {
    expect(parseParseArgs(['a.gd', '--help'])).toEqual({ mode: 'help' });
    expect(parseParseArgs(['-v'])).toEqual({ mode: 'version' });
  });

  it('takes an error ID to explain', () => {
    expect(parseParseArgs(['--explain', 'GDS-P002'])).toEqual({
      mode: 'explain',
      errorId: 'GDS-P002',
    });
  });

  it.each([
    [['--explain'], '--explain requires an error ID'],
    [['a.gd', '--format'], '--format requires argument: debug or json'],
    [['a.gd', '--format', 'xml'], 'Invalid format: xml. Expected debug or json'],
    [['--strict', 'a.gd'], 'Unknown option: --strict'],
    [['a.gd', 'b.gd'], 'Unexpected argument: b.gd'],
    [[], 'Missing path argument'],
  ])('rejects %j', (argv, message) => {
    expect(() => parseParseArgs(argv)).toThrow(message);
  });
});
