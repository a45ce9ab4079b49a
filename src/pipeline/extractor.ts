import { promises as fs } from 'fs';
import * as iconv from 'iconv-lite';
import mammoth from 'mammoth';
import pdfParse from 'pdf-parse/lib/pdf-parse.js';
import { errorMessage, ExtractionError } from '../errors.js';
import { createLogger } from '../logger.js';
import { parseSrt, stripTags } from './srt.js';

const log = createLogger('TextExtractor');

export interface TextExtractor {
  extract(sourcePath: string, fileFormat: string): Promise<string>;
}

export type PdfTextParser = (data: Buffer) => Promise<string>;

export interface FileTextExtractorOptions {
  parsePdf?: PdfTextParser;
}

export const EXTRACTABLE_FORMATS = ['txt', 'md', 'srt', 'docx', 'pdf'] as const;

// Tried in order once a file turns out not to be UTF-8
const LEGACY_ENCODINGS = ['gbk', 'gb2312', 'latin1'];

const defaultPdfParser: PdfTextParser = async data => (await pdfParse(data)).text;

/**
 * Decodes UTF-8, falling back to the legacy encodings for files that are not
 * valid UTF-8. An encoding is accepted when it decodes without replacement
 * characters.
 */
export function decodeText(data: Buffer): string {
  try {
    return new TextDecoder('utf-8', { fatal: true }).decode(data);
  } catch (error) {
    log.debug('File is not valid UTF-8, trying legacy encodings', { error: errorMessage(error) });
  }

  for (const encoding of LEGACY_ENCODINGS) {
    const text = iconv.decode(data, encoding);
    if (!text.includes('\uFFFD')) {
      log.debug('Decoded with legacy encoding', { encoding });
      return text;
    }
  }
  throw new ExtractionError('Unable to detect the file encoding');
}

function nonEmptyLines(text: string): string {
  return text.split('\n').filter(line => line.trim()).join('\n');
}

/**
 * Reads plain text and markdown as-is, Word documents one paragraph per line
 * and PDFs page by page with blank lines dropped. Subtitles yield one line
 * per cue, markup removed and the cue's own line breaks folded into spaces,
 * so the translated lines can be laid back onto the same cues.
 */
export class FileTextExtractor implements TextExtractor {
  private readonly parsePdf: PdfTextParser;

  constructor(options: FileTextExtractorOptions = {}) {
    this.parsePdf = options.parsePdf ?? defaultPdfParser;
  }

  async extract(sourcePath: string, fileFormat: string): Promise<string> {
    switch (fileFormat.toLowerCase()) {
      case 'txt':
      case 'md':
        return decodeText(await this.read(sourcePath));
      case 'srt':
        return parseSrt(decodeText(await this.read(sourcePath)))
          .map(cue => stripTags(cue.text).replace(/\s*\n\s*/g, ' ').trim())
          .filter(Boolean)
          .join('\n');
      case 'docx':
        return this.wrap(sourcePath, async () => {
          const { value } = await mammoth.extractRawText({ path: sourcePath });
          return nonEmptyLines(value);
        });
      case 'pdf': {
        const data = await this.read(sourcePath);
        return this.wrap(sourcePath, async () => nonEmptyLines(await this.parsePdf(data)));
      }
      default:
        throw new ExtractionError(`Unsupported file type: ${fileFormat}`);
    }
  }

  private read(sourcePath: string): Promise<Buffer> {
    return this.wrap(sourcePath, () => fs.readFile(sourcePath));
  }

  private async wrap<T>(sourcePath: string, task: () => Promise<T>): Promise<T> {
    try {
      return await task();
    } catch (error) {
      throw new ExtractionError(`Failed to read ${sourcePath}: ${errorMessage(error)}`);
    }
  }
}
