import { describe, it, expect } from 'vitest';
import {
  UsageError,
  assertKnownFlags,
  categoryFlag,
  countFlag,
  operationFlag,
  parseArgs,
  requirePositional,
  stringFlag,
} from '../src/args.js';

describe('parseArgs', () => {
  it('keeps every word of a sync query as a positional', () => {
    const args = parseArgs(['sync', 'in:inbox', 'older_than:1y', '--resume', '--operation', 'trash']);

    expect(args.command).toBe('sync');
    expect(args.subcommand).toBeUndefined();
    expect(args.positionals).toEqual(['in:inbox', 'older_than:1y']);
    expect([...args.flags]).toEqual([
      ['resume', true],
      ['operation', 'trash'],
    ]);
  });

  it('splits off the subcommand for store commands', () => {
    const args = parseArgs(['dlq', 'clear', 'msg-0001', '--operation=fetch']);

    expect(args).toEqual({
      command: 'dlq',
      subcommand: 'clear',
      positionals: ['msg-0001'],
      flags: new Map([['operation', 'fetch']]),
    });
  });

  it('treats everything after -- as positionals', () => {
    expect(parseArgs(['sync', '--', '--not-a-flag']).positionals).toEqual(['--not-a-flag']);
  });

  it('rejects a value flag without a value', () => {
    expect(() => parseArgs(['dlq', 'list', '--limit'])).toThrow(new UsageError('Missing value for --limit'));
    expect(() => parseArgs(['sync', 'q', '--out', '--resume'])).toThrow('Missing value for --out');
  });

  it('returns no command for an empty argv', () => {
    expect(parseArgs([])).toEqual({ command: undefined, positionals: [], flags: new Map() });
  });
});

describe('flag readers', () => {
  it('validates counts', () => {
    expect(countFlag(parseArgs(['dlq', 'list', '--limit', '7']), 'limit', 50)).toBe(7);
    expect(countFlag(parseArgs(['dlq', 'list']), 'limit', 50)).toBe(50);
    expect(() => countFlag(parseArgs(['dlq', 'list', '--limit', '-1']), 'limit', 50)).toThrow(
      "--limit must be a non-negative integer, got '-1'",
    );
    expect(() => countFlag(parseArgs(['dlq', 'list', '--limit', 'many']), 'limit', 50)).toThrow(UsageError);
  });

  it('accepts only known operations and categories', () => {
    expect(operationFlag(parseArgs(['sync', 'q', '--operation', 'mark_read']))).toBe('mark_read');
    expect(operationFlag(parseArgs(['sync', 'q']))).toBeUndefined();
    expect(() => operationFlag(parseArgs(['sync', 'q', '--operation', 'archive']))).toThrow(
      "--operation must be one of fetch, trash, delete, mark_read; got 'archive'",
    );
    expect(categoryFlag(parseArgs(['dlq', 'list', '--category', 'sink_error']))).toBe('sink_error');
    expect(() => categoryFlag(parseArgs(['dlq', 'list', '--category', 'oops']))).toThrow(UsageError);
  });

  it('rejects a boolean use of a value flag', () => {
    const args = parseArgs(['sync', 'q']);
    args.flags.set('out', true);
    expect(() => stringFlag(args, 'out')).toThrow('--out needs a value');
  });

  it('rejects unknown options', () => {
    expect(() => assertKnownFlags(parseArgs(['dlq', 'stats', '--verbose=1']), [])).toThrow('Unknown option --verbose');
  });

  it('requires exactly one positional', () => {
    expect(requirePositional(parseArgs(['checkpoints', 'show', 'abc']), 'syncId')).toBe('abc');
    expect(() => requirePositional(parseArgs(['checkpoints', 'show']), 'syncId')).toThrow('Missing <syncId>');
    expect(() => requirePositional(parseArgs(['checkpoints', 'show', 'a', 'b']), 'syncId')).toThrow(
      "Unexpected argument 'b'",
    );
  });
});
