/** Extensions with a dedicated text extractor. */
export const EXTRACTABLE_EXTENSIONS: ReadonlySet<string> = new Set(['pdf', 'docx']);

/**
 * Text of a PDF or DOCX upload. The parsers load on first use so the default
 * raw-decode path never pulls them in.
 */
export async function extractDocumentText(extension: string, buffer: Buffer): Promise<string> {
  if (extension === 'pdf') {
    const { PDFParse } = await import('pdf-parse');
    const parser = new PDFParse({ data: buffer });
    try {
      const result = await parser.getText();
      return result.text;
    } finally {
      await parser.destroy();
    }
  }
  if (extension === 'docx') {
    const mammoth = await import('mammoth');
    const parsed = await mammoth.extractRawText({ buffer });
    return parsed.value;
  }
  return decodeUtf8(buffer);
}

/** Lossy UTF-8 decode: invalid sequences become U+FFFD instead of throwing. */
export function decodeUtf8(buffer: Buffer): string {
  return buffer.toString('utf8');
}
