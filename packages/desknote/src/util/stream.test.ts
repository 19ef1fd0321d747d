import { Readable } from 'node:stream';
import { describe, expect, test, vi } from 'vitest';

import { Stream } from './stream';

const encode = (text: string) => new TextEncoder().encode(text);

describe('Stream', () => {
  describe('toLines', () => {
    test('splits chunks into trimmed lines', async () => {
      const lines: string[] = [];
      const stream = Readable.from([encode('first li'), encode('ne\n  second  \nthi'), encode('rd')]);

      const handled = await Stream.toLines(stream, (line) => {
        lines.push(line);
      });

      expect(lines).toEqual(['first line', 'second', 'third']);
      expect(handled).toBe(3);
    });

    test('accepts string chunks', async () => {
      const onLine = vi.fn();

      await Stream.toLines(Readable.from(['a\nb\n']), onLine);

      expect(onLine.mock.calls).toEqual([['a'], ['b']]);
    });

    test('skips blank lines', async () => {
      const onLine = vi.fn();

      const handled = await Stream.toLines(Readable.from([encode('\n   \nvalid\n\n')]), onLine);

      expect(handled).toBe(1);
      expect(onLine).toHaveBeenCalledWith('valid');
    });

    test('stops consuming when the handler returns true', async () => {
      const onLine = vi.fn((line: string) => line === 'stop');

      const handled = await Stream.toLines(
        Readable.from([encode('go\nstop\nnever\n')]),
        onLine,
      );

      expect(handled).toBe(2);
      expect(onLine).toHaveBeenCalledTimes(2);
    });

    test('decodes multi-byte characters split across chunks', async () => {
      const bytes = encode('héllo\n');
      const lines: string[] = [];

      await Stream.toLines(Readable.from([bytes.slice(0, 2), bytes.slice(2)]), (line) => {
        lines.push(line);
      });

      expect(lines).toEqual(['héllo']);
    });

    test('returns zero for an empty stream', async () => {
      expect(await Stream.toLines(Readable.from([]), () => {})).toBe(0);
    });
  });
});
