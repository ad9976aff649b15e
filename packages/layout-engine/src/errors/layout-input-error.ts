/**
 * Why a page could not be analyzed.
 */
export type LayoutInputErrorReason =
  | 'empty-page'
  | 'degenerate-width'
  | 'malformed-input';

/**
 * LayoutInputError
 *
 * Raised by input normalization for pages the classifier cannot work on.
 * LayoutEngine catches it and answers with the default single-column layout,
 * so callers never see it.
 */
export class LayoutInputError extends Error {
  constructor(
    public readonly reason: LayoutInputErrorReason,
    message: string,
    options?: ErrorOptions,
  ) {
    super(message, options);
    this.name = 'LayoutInputError';
  }
}
