/**
 * Page-addressable handle over a source document.
 *
 * Owned exclusively by the running batch; opened once and closed once.
 */
export interface SourceDocument {
  /** Path the document was opened from */
  readonly sourcePath: string;

  /** Number of pages */
  readonly pageCount: number;

  /**
   * Text layer of one page (0-based). Empty for image-only pages.
   */
  extractText(pageIndex: number): Promise<string>;

  /**
   * Render one page (0-based) to PNG at `scale` times its native size.
   */
  renderPage(pageIndex: number, scale: number): Promise<Buffer>;

  /**
   * Copy the given pages, in order, into a new PDF and return its bytes.
   * The source is never modified.
   */
  extractPages(pageIndices: readonly number[]): Promise<Uint8Array>;

  /**
   * Release the handle. Further calls throw; calling twice is a no-op.
   */
  close(): Promise<void>;
}

/**
 * Opens a source document from a path.
 */
export type SourceDocumentOpener = (sourcePath: string) => Promise<SourceDocument>;
