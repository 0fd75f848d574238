/**
 * An HTML layout engine that turns one HTML file into the PDF of its pages.
 */
export interface HtmlRenderer {
  /**
   * @param htmlFile - HTML file to lay out
   * @param baseDir - directory that relative references in the HTML (images, linked styles) resolve against
   * @param stylesheet - CSS applied on top of the document's own styles
   * @returns the rendered PDF
   */
  render(htmlFile: string, baseDir: string, stylesheet: string): Promise<Uint8Array>;

  /** Releases whatever the engine holds between renders. */
  close(): Promise<void>;
}
