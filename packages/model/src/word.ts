/**
 * Word record as delivered by the word extraction step (PDF text layer,
 * DOCX runs or OCR).
 *
 * `bbox` is `[x0, y0, x1, y1]` in page points with the origin at the
 * top-left corner of the page.
 */
export interface WordInput {
  /** Word text. Opaque to layout detection. */
  text: string;

  /** Bounding box `[x0, y0, x1, y1]` */
  bbox: readonly [number, number, number, number];

  /** Font size in points, when the extractor knows it */
  fontSize?: number | null;

  /** Whether the word is set in a bold face */
  isBold?: boolean;
}

/**
 * Normalized, immutable word.
 *
 * Guarantees `x1 >= x0` and `y1 >= y0`. Font attributes are carried for
 * downstream consumers (section detection, NER); the layout engine never
 * reads them.
 */
export interface Word {
  readonly text: string;
  readonly x0: number;
  readonly y0: number;
  readonly x1: number;
  readonly y1: number;

  /** `null` when the extractor reported no font size */
  readonly fontSize: number | null;

  /** `false` when the extractor reported no weight */
  readonly isBold: boolean;
}
