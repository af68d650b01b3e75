import { describe, it, expect } from 'vitest';

import { buildHandshake, toOptionMsg } from '../commands/handshake.js';
import { renderBestMove } from '../commands/messages.js';
import { DEFAULT_ENGINE_CONFIG } from '../config/defaults.js';
import { InputError } from '../errors/index.js';

describe('toOptionMsg', () => {
  it('converts every option type', () => {
    expect(toOptionMsg({ type: 'check', name: 'Ponder', default: true })).toMatchObject({
      id: 'Ponder',
      type: 'check',
      default: 'true',
    });
    expect(toOptionMsg({ type: 'spin', name: 'Hash', default: 16, min: 1, max: 1024 })).toMatchObject(
      { id: 'Hash', type: 'spin', default: '16', min: 1, max: 1024 },
    );
    expect(
      toOptionMsg({ type: 'combo', name: 'Style', default: 'normal', vars: ['solid', 'normal'] }),
    ).toMatchObject({ id: 'Style', type: 'combo', default: 'normal', vars: ['solid', 'normal'] });
    expect(toOptionMsg({ type: 'button', name: 'Clear Hash' })).toMatchObject({
      id: 'Clear Hash',
      type: 'button',
    });
    expect(toOptionMsg({ type: 'string', name: 'Book', default: 'book.bin' })).toMatchObject({
      id: 'Book',
      type: 'string',
      default: 'book.bin',
    });
  });
});

describe('buildHandshake', () => {
  it('renders the default engine handshake', () => {
    expect(buildHandshake(DEFAULT_ENGINE_CONFIG)).toEqual([
      'id name Knightline 0.1.0',
      'id author The Knightline developers',
      'option name Hash type spin default 16 min 1 max 1024',
      'option name Ponder type check default false',
      'option name Clear Hash type button',
      'uciok',
    ]);
  });

  it('renders only identity and uciok without options', () => {
    expect(buildHandshake({ name: 'E', author: 'A', options: [] })).toEqual([
      'id name E',
      'id author A',
      'uciok',
    ]);
  });
});

describe('renderBestMove', () => {
  it('renders a valid move', () => {
    expect(renderBestMove('e7e8q')).toBe('bestmove e7e8q');
  });

  it('rejects an invalid move', () => {
    expect(() => renderBestMove('Nf3')).toThrow(InputError);
  });
});
