import type { RawSegment, Segment } from '../types/segmentation';

/**
 * Contexte d'un segment : la fin du texte source qui le précède, limitée à
 * `maxContextChars`. Le texte le plus proche de la frontière est placé en
 * dernier. Le segment 0 n'a pas de contexte.
 */
export function buildContext(
  segments: readonly Pick<RawSegment, 'text' | 'separator'>[],
  index: number,
  maxContextChars: number
): string {
  if (index <= 0 || maxContextChars <= 0) {
    return '';
  }

  // On remonte seulement le nombre de segments nécessaire pour remplir le budget
  let material = '';
  for (let i = Math.min(index, segments.length) - 1; i >= 0; i--) {
    material = segments[i].text + segments[i].separator + material;
    if (material.trimEnd().length > maxContextChars) break;
  }

  material = material.trimEnd();
  if (material.length <= maxContextChars) {
    return material;
  }

  let start = material.length - maxContextChars;
  if (/[\uDC00-\uDFFF]/.test(material.charAt(start))) {
    start += 1;
  }

  const tail = material.slice(start);
  // Éviter de commencer au milieu d'un mot si une frontière existe dans la fenêtre
  if (!/\s/.test(material.charAt(start - 1))) {
    const boundary = tail.search(/\s/);
    if (boundary !== -1) {
      return tail.slice(boundary).trimStart();
    }
  }
  return tail.trimStart();
}

export function buildSegments(rawSegments: readonly RawSegment[], maxContextChars: number): Segment[] {
  return rawSegments.map((segment, index) => ({
    index,
    text: segment.text,
    leading: segment.leading,
    separator: segment.separator,
    context: buildContext(rawSegments, index, maxContextChars)
  }));
}
