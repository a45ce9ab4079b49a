export interface SubtitleCue {
  /** Cue number as written in the file, 1-based */
  index: number;
  startTime: number;
  endTime: number;
  text: string;
}

export class SrtParseError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'SrtParseError';
  }
}

/** `HH:MM:SS,mmm` (or with a period before the milliseconds) to milliseconds. */
export function parseSrtTimestamp(timestamp: string): number {
  const match = timestamp.trim().match(/^(\d{1,2}):(\d{2}):(\d{2})[,.](\d{3})$/);
  if (!match) {
    throw new SrtParseError(`Invalid SRT timestamp: ${timestamp}`);
  }
  const [, hours, minutes, seconds, millis] = match;
  return (parseInt(hours, 10) * 3600 + parseInt(minutes, 10) * 60 + parseInt(seconds, 10)) * 1000 + parseInt(millis, 10);
}

export function formatSrtTimestamp(ms: number): string {
  const totalSeconds = Math.floor(ms / 1000);
  const hh = Math.floor(totalSeconds / 3600).toString().padStart(2, '0');
  const mm = Math.floor((totalSeconds % 3600) / 60).toString().padStart(2, '0');
  const ss = (totalSeconds % 60).toString().padStart(2, '0');
  const mmm = (ms % 1000).toString().padStart(3, '0');
  return `${hh}:${mm}:${ss},${mmm}`;
}

function parseTiming(line: string): { startTime: number; endTime: number } | null {
  const arrow = line.indexOf('-->');
  if (arrow === -1) return null;
  try {
    return {
      startTime: parseSrtTimestamp(line.slice(0, arrow)),
      endTime: parseSrtTimestamp(line.slice(arrow + 3)),
    };
  } catch {
    return null;
  }
}

/**
 * Blocks without a valid timing line are skipped, as are cues with no text.
 */
export function parseSrt(content: string): SubtitleCue[] {
  const lines = content.replace(/^\uFEFF/, '').replace(/\r\n?/g, '\n').split('\n');
  const cues: SubtitleCue[] = [];
  let i = 0;

  while (i < lines.length) {
    while (i < lines.length && lines[i].trim() === '') i++;
    if (i >= lines.length) break;

    let index = cues.length + 1;
    if (/^\d+$/.test(lines[i].trim())) {
      index = parseInt(lines[i].trim(), 10);
      i++;
    }

    const timing = i < lines.length ? parseTiming(lines[i]) : null;
    if (!timing) {
      i++;
      continue;
    }
    i++;

    const textLines: string[] = [];
    while (i < lines.length && lines[i].trim() !== '') {
      textLines.push(lines[i]);
      i++;
    }

    const text = textLines.join('\n').trim();
    if (text) {
      cues.push({ index, ...timing, text });
    }
  }

  return cues;
}

export function formatSrt(cues: SubtitleCue[]): string {
  return cues
    .map(cue => `${cue.index}\n${formatSrtTimestamp(cue.startTime)} --> ${formatSrtTimestamp(cue.endTime)}\n${cue.text}\n`)
    .join('\n');
}

export function stripTags(text: string): string {
  return text.replace(/<[^>]+>/g, '');
}
