import { debugLog } from '../utils/logger';
import { EmptyInputError } from './errors';
import { buildSegments } from './context-builder';
import type { RawSegment, Segment, SegmentationConfig } from '../types/segmentation';

type BreakKind = 'paragraph' | 'sentence' | 'line' | 'end';

interface TextUnit {
  text: string;
  separator: string;
  breakKind: BreakKind;
}

export const AVG_CHARS_PER_TOKEN = 4;

// Fin de phrase, éventuellement suivie de guillemets ou parenthèses fermants
const SENTENCE_END = /[.!?…]["'”’»)\]]*$/;
const PARAGRAPH_BREAK = /\n[^\S\n]*\n/;
const SENTENCE_LOOKBEHIND = 8;

export function estimateTokens(text: string): number {
  return Math.ceil(text.length / AVG_CHARS_PER_TOKEN);
}

function classifyBreak(before: string, whitespace: string): BreakKind | null {
  if (PARAGRAPH_BREAK.test(whitespace)) return 'paragraph';
  if (SENTENCE_END.test(before)) return 'sentence';
  if (whitespace.includes('\n')) return 'line';
  return null;
}

/**
 * Découpe le corps du texte (sans espaces initiaux) en unités séparées par
 * une fin de paragraphe, de phrase ou de ligne. Chaque unité garde
 * l'espacement qui la suit.
 */
function splitUnits(body: string): TextUnit[] {
  const units: TextUnit[] = [];
  const whitespace = /\s+/g;
  let unitStart = 0;
  let match: RegExpExecArray | null;

  while ((match = whitespace.exec(body)) !== null) {
    const end = match.index + match[0].length;
    const kind: BreakKind | null = end === body.length
      ? 'end'
      : classifyBreak(body.slice(Math.max(unitStart, match.index - SENTENCE_LOOKBEHIND), match.index), match[0]);

    if (kind === null) continue;

    units.push({ text: body.slice(unitStart, match.index), separator: match[0], breakKind: kind });
    unitStart = end;
  }

  if (unitStart < body.length) {
    units.push({ text: body.slice(unitStart), separator: '', breakKind: 'end' });
  }
  return units;
}

function groupParagraphs(units: TextUnit[]): TextUnit[][] {
  const blocks: TextUnit[][] = [];
  let current: TextUnit[] = [];
  for (const unit of units) {
    current.push(unit);
    if (unit.breakKind === 'paragraph' || unit.breakKind === 'end') {
      blocks.push(current);
      current = [];
    }
  }
  if (current.length > 0) blocks.push(current);
  return blocks;
}

function isHighSurrogate(code: number): boolean {
  return code >= 0xd800 && code <= 0xdbff;
}

// Coupe franche en fenêtres fixes, sans chevauchement
function hardSplit(unit: TextUnit, maxSize: number): TextUnit[] {
  const pieces: TextUnit[] = [];
  let start = 0;

  while (unit.text.length - start > maxSize) {
    let end = start + maxSize;
    if (isHighSurrogate(unit.text.charCodeAt(end - 1))) {
      // Une fenêtre d'un seul caractère garde la paire entière
      end = end - 1 > start ? end - 1 : end + 1;
    }
    pieces.push({ text: unit.text.slice(start, end), separator: '', breakKind: unit.breakKind });
    start = end;
  }

  pieces.push({ text: unit.text.slice(start), separator: unit.separator, breakKind: unit.breakKind });
  return pieces;
}

class SegmentPacker {
  private readonly segments: Array<{ text: string; separator: string }> = [];
  private text = '';
  private separator = '';

  constructor(private readonly maxSize: number) {}

  push(text: string, separator: string): void {
    if (this.text && this.text.length + this.separator.length + text.length > this.maxSize) {
      this.flush();
    }
    this.text = this.text ? this.text + this.separator + text : text;
    this.separator = separator;
  }

  flush(): void {
    if (this.text) {
      this.segments.push({ text: this.text, separator: this.separator });
    }
    this.text = '';
    this.separator = '';
  }

  finish(): Array<{ text: string; separator: string }> {
    this.flush();
    return this.segments;
  }
}

/**
 * Découpe un texte en segments d'au plus `maxSegmentSize` caractères.
 *
 * Les paragraphes entiers sont regroupés tant qu'ils tiennent dans un segment ;
 * un paragraphe trop long est découpé par phrases puis par lignes, et une
 * unité sans frontière détectable est coupée en fenêtres fixes.
 * `leading + Σ(text + separator)` redonne exactement le texte source.
 */
export function chunkText(text: string, maxSegmentSize: number): RawSegment[] {
  if (!Number.isInteger(maxSegmentSize) || maxSegmentSize < 1) {
    throw new RangeError(`maxSegmentSize invalide: ${maxSegmentSize}`);
  }
  if (text.trim().length === 0) {
    throw new EmptyInputError();
  }

  const leading = /^\s*/.exec(text)?.[0] ?? '';
  const units = splitUnits(text.slice(leading.length));
  const packer = new SegmentPacker(maxSegmentSize);

  for (const block of groupParagraphs(units)) {
    const blockText = block.map((unit, i) => (i < block.length - 1 ? unit.text + unit.separator : unit.text)).join('');
    const blockSeparator = block[block.length - 1].separator;

    if (blockText.length <= maxSegmentSize) {
      packer.push(blockText, blockSeparator);
      continue;
    }

    for (const unit of block) {
      for (const piece of hardSplit(unit, maxSegmentSize)) {
        packer.push(piece.text, piece.separator);
      }
    }
  }

  const segments = packer.finish().map((segment, index) => ({
    text: segment.text,
    leading: index === 0 ? leading : '',
    separator: segment.separator
  }));

  debugLog('Découpage terminé', { units: units.length, segments: segments.length, maxSegmentSize });
  return segments;
}

/**
 * Réassemble les segments traduits dans l'ordre des index, en réinsérant
 * l'espacement retiré lors du découpage.
 */
export function reassembleText(
  segments: readonly Segment[],
  results: ReadonlyMap<number, string>
): string {
  return [...segments]
    .sort((a, b) => a.index - b.index)
    .map(segment => {
      const translated = results.get(segment.index);
      if (translated === undefined) {
        throw new Error(`Segment ${segment.index} sans traduction`);
      }
      return segment.leading + translated + segment.separator;
    })
    .join('');
}

export class TextSegmenter {
  constructor(private readonly config: SegmentationConfig) {}

  public segmentText(text: string): Segment[] {
    return buildSegments(chunkText(text, this.config.maxSegmentSize), this.config.maxContextChars);
  }
}
