import assert from 'node:assert/strict';
import { describe, test } from 'node:test';

import { EmptyInputError } from '../errors';
import {
  TextSegmenter,
  chunkText,
  estimateTokens,
  reassembleText
} from '../text-segmenter';
import type { RawSegment, Segment } from '../../types/segmentation';

function join(segments: RawSegment[]): string {
  return segments.map(s => s.leading + s.text + s.separator).join('');
}

describe('chunkText', () => {
  test('short input returns a single segment without context material', () => {
    const segments = chunkText('Sentence one. Sentence two.', 1000);

    assert.deepEqual(segments, [
      { text: 'Sentence one. Sentence two.', leading: '', separator: '' }
    ]);
  });

  test('keeps whole paragraphs together when they fit', () => {
    const segments = chunkText('Alpha one. Alpha two.\n\nBeta one. Beta two.', 25);

    assert.deepEqual(segments, [
      { text: 'Alpha one. Alpha two.', leading: '', separator: '\n\n' },
      { text: 'Beta one. Beta two.', leading: '', separator: '' }
    ]);
  });

  test('splits an oversized paragraph on sentence boundaries', () => {
    const segments = chunkText('One one. Two two. Three three.', 18);

    assert.deepEqual(segments.map(s => [s.text, s.separator]), [
      ['One one. Two two.', ' '],
      ['Three three.', '']
    ]);
  });

  test('treats closing quotes after a full stop as a sentence end', () => {
    const segments = chunkText('He said "stop." Then he left.', 16);

    assert.deepEqual(segments.map(s => s.text), ['He said "stop."', 'Then he left.']);
  });

  test('falls back to fixed windows without overlap when no boundary exists', () => {
    const segments = chunkText('abcdefghij', 4);

    assert.deepEqual(segments.map(s => s.text), ['abcd', 'efgh', 'ij']);
    assert.ok(segments.every(s => s.separator === ''));
  });

  test('never cuts a surrogate pair in half', () => {
    const segments = chunkText('😀😀😀', 3);

    assert.deepEqual(segments.map(s => s.text), ['😀', '😀', '😀']);
  });

  test('widens a one-character window to keep a surrogate pair whole', () => {
    assert.deepEqual(chunkText('😀a', 1).map(s => s.text), ['😀', 'a']);
    assert.deepEqual(chunkText('😀', 1).map(s => s.text), ['😀']);
  });

  test('keeps leading and trailing whitespace on the outer segments', () => {
    const segments = chunkText('\n\n  Hello world.  \n', 100);

    assert.deepEqual(segments, [
      { text: 'Hello world.', leading: '\n\n  ', separator: '  \n' }
    ]);
  });

  test('round-trips the source text exactly', () => {
    const samples = [
      '  \n\nFirst para. Second sentence!\n\nSecond para?  Yes.\nLine two\n\n\n',
      'Line without punctuation\nanother line\r\n\r\nlast paragraph',
      'Un long paragraphe… sans fin « vraiment » ? Oui ! Et encore une phrase très longue qui dépasse la limite.',
      'x'.repeat(57) + ' ' + 'y'.repeat(13),
      '\t\tTabbed.\tText.\n'
    ];

    for (const sample of samples) {
      for (const maxSize of [1, 5, 12, 40, 1000]) {
        const segments = chunkText(sample, maxSize);
        assert.equal(join(segments), sample, `maxSize=${maxSize}`);
        assert.ok(segments.length >= 1);
        assert.ok(segments.every(s => s.text.length > 0 && s.text.length <= maxSize));
        assert.ok(segments.slice(1).every(s => s.leading === ''));
      }
    }
  });

  test('rejects empty and whitespace-only input', () => {
    assert.throws(() => chunkText('', 10), EmptyInputError);
    assert.throws(() => chunkText('  \n\t ', 10), EmptyInputError);
  });

  test('rejects a non-positive segment size', () => {
    assert.throws(() => chunkText('Hello.', 0), RangeError);
  });
});

describe('reassembleText', () => {
  test('orders by index and restores separators', () => {
    const segments: Segment[] = [
      { index: 1, text: 'b', leading: '', separator: '', context: 'a' },
      { index: 0, text: 'a', leading: ' ', separator: '\n', context: '' }
    ];

    const text = reassembleText(segments, new Map([[1, 'B'], [0, 'A']]));

    assert.equal(text, ' A\nB');
  });

  test('refuses to assemble when an index has no translation', () => {
    const segments: Segment[] = [{ index: 0, text: 'a', leading: '', separator: '', context: '' }];

    assert.throws(() => reassembleText(segments, new Map()), /Segment 0 sans traduction/);
  });
});

describe('TextSegmenter', () => {
  test('attaches source context to every segment after the first', () => {
    const segmenter = new TextSegmenter({ maxSegmentSize: 18, maxContextChars: 9 });

    const segments = segmenter.segmentText('One one. Two two. Three three.');

    assert.deepEqual(segments, [
      { index: 0, text: 'One one. Two two.', leading: '', separator: ' ', context: '' },
      { index: 1, text: 'Three three.', leading: '', separator: '', context: 'Two two.' }
    ]);
  });

  test('estimates tokens from the character count', () => {
    assert.equal(estimateTokens('abcdefghi'), 3);
    assert.equal(estimateTokens(''), 0);
  });
});
