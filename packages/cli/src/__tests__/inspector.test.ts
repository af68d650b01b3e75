import { Readable } from 'node:stream';

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';

import { STARTING_FEN } from '@knightline/uci';

import { inspectStream } from '../commands/inspect.js';
import { ProtocolError } from '../errors/index.js';
import { TranscriptInspector, inspectTokens, type InspectorOptions } from '../inspect/inspector.js';
import { Reporter } from '../output/reporter.js';

const TEXT_OPTIONS: InspectorOptions = {
  format: 'text',
  replayMoves: false,
  reportUnknown: false,
  strict: false,
};

describe('inspectTokens', () => {
  it('returns a parsed outcome', () => {
    expect(inspectTokens(['go', 'infinite'], 4, false)).toEqual({
      status: 'parsed',
      lineNumber: 4,
      command: { type: 'go', payload: { movetime: 0n, infinite: true } },
    });
  });

  it('returns a failed outcome with the parsing error', () => {
    const outcome = inspectTokens(['debug', 'maybe'], 1, false);
    expect(outcome.status).toBe('failed');
    expect(outcome).toMatchObject({ error: { kind: 'UnknownToken', token: 'maybe' } });
  });

  it('ignores unknown verbs and blank lines', () => {
    expect(inspectTokens(['register', 'later'], 2, false)).toEqual({
      status: 'ignored',
      lineNumber: 2,
      verb: 'register',
    });
    expect(inspectTokens([], 3, false)).toEqual({ status: 'ignored', lineNumber: 3, verb: undefined });
  });

  it('replays position commands on request', () => {
    expect(inspectTokens(['position', 'startpos', 'moves', 'g1f3'], 1, true)).toMatchObject({
      status: 'parsed',
      replay: { san: ['Nf3'] },
    });
  });

  it('reports an illegal move without failing the line', () => {
    const outcome = inspectTokens(['position', 'startpos', 'moves', 'e2e5'], 1, true);
    expect(outcome).toMatchObject({
      status: 'parsed',
      replayError: `Illegal move "e2e5" in position: ${STARTING_FEN}`,
    });
  });
});

/**
 * Silence and capture console output for one test
 */
function captureConsole() {
  return {
    log: vi.spyOn(console, 'log').mockImplementation(() => undefined),
    err: vi.spyOn(console, 'error').mockImplementation(() => undefined),
  };
}

describe('TranscriptInspector', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('prints one text line per recognized command', () => {
    const { log, err } = captureConsole();
    const inspector = new TranscriptInspector(TEXT_OPTIONS, new Reporter({ color: false }));

    inspector.handle('uci');
    inspector.handle('setoption name Hash value 64');
    inspector.handle('position startpos moves e2e4');
    inspector.handle('go movetime 500');

    expect(log.mock.calls).toEqual([
      ['1: uci'],
      ['2: setoption name="Hash" value="64"'],
      [`3: position fen="${STARTING_FEN}" moves=[e2e4]`],
      ['4: go movetime=500 infinite=false'],
    ]);
    expect(err).not.toHaveBeenCalled();
  });

  it('reports malformed lines and keeps going', () => {
    const { log, err } = captureConsole();
    const inspector = new TranscriptInspector(TEXT_OPTIONS, new Reporter({ color: false }));

    inspector.handle('go depth 10');
    inspector.handle('isready');

    expect(err.mock.calls).toEqual([["✗ line 1: Unknown token 'depth'"]]);
    expect(log.mock.calls).toEqual([['2: isready']]);
    expect(inspector.getStats()).toEqual({
      total: 2,
      parsed: 1,
      ignored: 0,
      failed: 1,
      replayFailures: 0,
    });
  });

  it('skips unknown verbs silently by default', () => {
    const { log, err } = captureConsole();
    const inspector = new TranscriptInspector(TEXT_OPTIONS, new Reporter({ color: false }));

    inspector.handle('register later');
    inspector.handle('');

    expect(log).not.toHaveBeenCalled();
    expect(err).not.toHaveBeenCalled();
    expect(inspector.getStats().ignored).toBe(2);
  });

  it('reports unknown verbs on request', () => {
    const { err } = captureConsole();
    const inspector = new TranscriptInspector(
      { ...TEXT_OPTIONS, reportUnknown: true },
      new Reporter({ color: false }),
    );

    inspector.handle('register later');
    inspector.handle('   ');

    expect(err.mock.calls).toEqual([["⚠ line 1: ignoring unknown command 'register'"]]);
  });

  it('prints skipped lines in verbose mode', () => {
    const { err } = captureConsole();
    const inspector = new TranscriptInspector(
      TEXT_OPTIONS,
      new Reporter({ color: false, verbose: true }),
    );

    inspector.handle('register later');

    expect(err.mock.calls).toEqual([['line 1: skipped']]);
  });

  it('throws on the first malformed line in strict mode', () => {
    const { err } = captureConsole();
    const inspector = new TranscriptInspector(
      { ...TEXT_OPTIONS, strict: true },
      new Reporter({ color: false }),
    );

    inspector.handle('uci');
    expect(() => inspector.handle('quit now')).toThrow(ProtocolError);
    expect(err).not.toHaveBeenCalled();
    expect(inspector.getStats().failed).toBe(1);
  });

  it('prints the replayed position', () => {
    const { log } = captureConsole();
    const inspector = new TranscriptInspector(
      { ...TEXT_OPTIONS, replayMoves: true },
      new Reporter({ color: false }),
    );

    inspector.handle('position startpos moves g1f3 g8f6');

    expect(log.mock.calls).toEqual([
      [`1: position fen="${STARTING_FEN}" moves=[g1f3 g8f6]`],
      ['  => rnbqkb1r/pppppppp/5n2/8/8/5N2/PPPPPPPP/RNBQKB1R w KQkq - 2 2 after Nf3 Nf6'],
    ]);
  });

  it('prints JSON records', () => {
    const { log } = captureConsole();
    const inspector = new TranscriptInspector(
      { ...TEXT_OPTIONS, format: 'json', reportUnknown: true },
      new Reporter({ color: false }),
    );

    inspector.handle('debug on');
    inspector.handle('debug maybe');
    inspector.handle('register later');

    expect(log.mock.calls).toEqual([
      ['{"line":1,"status":"parsed","command":{"type":"debug","enabled":true}}'],
      [
        '{"line":2,"status":"failed","error":{"kind":"UnknownToken","message":"Unknown token \'maybe\'"}}',
      ],
      ['{"line":3,"status":"ignored","verb":"register"}'],
    ]);
  });

  it('writes go movetime as a decimal string in JSON', () => {
    const { log } = captureConsole();
    const inspector = new TranscriptInspector(
      { ...TEXT_OPTIONS, format: 'json' },
      new Reporter({ color: false }),
    );

    inspector.handle('go movetime 18446744073709551615');

    expect(log.mock.calls).toEqual([
      [
        '{"line":1,"status":"parsed","command":{"type":"go","payload":{"movetime":"18446744073709551615","infinite":false}}}',
      ],
    ]);
  });

  it('prints tokens in debug mode', () => {
    const { err } = captureConsole();
    const inspector = new TranscriptInspector(
      TEXT_OPTIONS,
      new Reporter({ color: false, debug: true }),
    );

    inspector.handle('  go   infinite ');

    expect(err).toHaveBeenCalledWith('[debug] line 1: tokens=["go","infinite"] type=go');
  });
});

describe('inspectStream', () => {
  beforeEach(() => {
    vi.spyOn(console, 'log').mockImplementation(() => undefined);
    vi.spyOn(console, 'error').mockImplementation(() => undefined);
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('inspects every line of the stream', async () => {
    const input = Readable.from(['uci\nisready\n', 'go infinite\r\nstop\n', 'quit extra\n']);
    const inspector = new TranscriptInspector(TEXT_OPTIONS, new Reporter({ color: false }));

    const stats = await inspectStream(input, inspector);

    expect(stats).toEqual({ total: 5, parsed: 4, ignored: 0, failed: 1, replayFailures: 0 });
  });
});

describe('Reporter', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('prints a plain summary without color', () => {
    const err = vi.spyOn(console, 'error').mockImplementation(() => undefined);
    new Reporter({ color: false }).summary({
      total: 6,
      parsed: 3,
      ignored: 1,
      failed: 2,
      replayFailures: 1,
    });

    expect(err.mock.calls).toEqual([
      [''],
      ['Summary: 6 lines, 3 parsed, 1 ignored, 2 failed, 1 not replayable'],
    ]);
  });

  it('stays quiet when silent', () => {
    const err = vi.spyOn(console, 'error').mockImplementation(() => undefined);
    const reporter = new Reporter({ color: false, silent: true });

    reporter.warn('x');
    reporter.info('y');

    expect(err).not.toHaveBeenCalled();
  });
});
