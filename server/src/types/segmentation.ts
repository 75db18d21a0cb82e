export interface SegmentationConfig {
  maxSegmentSize: number;
  maxContextChars: number;
}

// Segment brut issu du découpage, avant l'ajout du contexte
export interface RawSegment {
  text: string;
  leading: string;
  separator: string;
}

export interface Segment extends RawSegment {
  index: number;
  context: string;
}
