export interface RenderOptions {
  /** Stored as the document title */
  title: string;
}

/**
 * Turns a self-contained HTML document into PDF bytes. The document never
 * references external resources; inline images arrive as data URIs.
 */
export interface RenderingEngine {
  render(html: string, options: RenderOptions): Promise<Uint8Array>;
}
