/**
 * PDF Extractor
 *
 * Text layer extraction with pdfjs-dist (legacy build, which runs on Node
 * without a DOM). Scanned PDFs without a text layer yield empty text.
 */

/**
 * Extract the text of every page, one line per page.
 */
export async function extractPdfText(data: Uint8Array): Promise<{ text: string }> {
  const { getDocument } = await import('pdfjs-dist/legacy/build/pdf.mjs');

  const pdf = await getDocument({
    data,
    useWorkerFetch: false,
    isEvalSupported: false,
    disableFontFace: true,
  }).promise;

  try {
    const pages: string[] = [];
    for (let pageNumber = 1; pageNumber <= pdf.numPages; pageNumber++) {
      const page = await pdf.getPage(pageNumber);
      const content = await page.getTextContent();
      pages.push(content.items.map((item) => ('str' in item ? item.str : '')).join(' '));
    }
    return { text: pages.join('\n') };
  } finally {
    await pdf.destroy();
  }
}
