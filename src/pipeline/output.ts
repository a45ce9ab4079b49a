import { Document, Packer, Paragraph } from 'docx';
import { promises as fs } from 'fs';
import path from 'path';
import { errorMessage, ReassemblyError } from '../errors.js';
import { JobRecord } from '../types.js';
import { formatSrt, parseSrt } from './srt.js';

export interface OutputWriter {
  /** Writes the translated document and returns where it went. */
  write(job: JobRecord, translatedText: string): Promise<string>;
}

export function translatedFilePath(sourcePath: string, extension: string): string {
  const parsed = path.parse(sourcePath);
  return path.join(parsed.dir, `${parsed.name}_translated.${extension}`);
}

/**
 * Writes `<name>_translated.<ext>` beside the source. Subtitles keep their
 * original numbering and timings, with one translated line per cue; Word
 * documents get one paragraph per non-empty line; PDFs and anything else
 * are written as plain text.
 */
export class FileOutputWriter implements OutputWriter {
  async write(job: JobRecord, translatedText: string): Promise<string> {
    if (!job.sourcePath) {
      throw new ReassemblyError(`Job ${job.jobId} has no source file to write beside`);
    }

    const format = (job.fileFormat ?? path.extname(job.sourcePath).slice(1)).toLowerCase();

    try {
      switch (format) {
        case 'txt':
        case 'md': {
          const outputPath = translatedFilePath(job.sourcePath, format);
          await fs.writeFile(outputPath, translatedText, 'utf-8');
          return outputPath;
        }
        case 'srt': {
          const outputPath = translatedFilePath(job.sourcePath, 'srt');
          const original = await fs.readFile(job.sourcePath, 'utf-8');
          const lines = translatedText.split('\n').map(line => line.trim()).filter(Boolean);
          const cues = parseSrt(original).map((cue, i) => ({ ...cue, text: lines[i] ?? cue.text }));
          await fs.writeFile(outputPath, formatSrt(cues), 'utf-8');
          return outputPath;
        }
        case 'docx': {
          const outputPath = translatedFilePath(job.sourcePath, 'docx');
          const paragraphs = translatedText
            .split('\n')
            .filter(line => line.trim())
            .map(line => new Paragraph(line));
          const document = new Document({ sections: [{ children: paragraphs }] });
          await fs.writeFile(outputPath, await Packer.toBuffer(document));
          return outputPath;
        }
        default: {
          const outputPath = translatedFilePath(job.sourcePath, 'txt');
          await fs.writeFile(outputPath, translatedText, 'utf-8');
          return outputPath;
        }
      }
    } catch (error) {
      throw new ReassemblyError(`Failed to write translated file for job ${job.jobId}: ${errorMessage(error)}`);
    }
  }
}
