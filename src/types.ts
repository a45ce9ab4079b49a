export type ProviderId = 'openai' | 'anthropic' | 'gemini' | 'google' | 'baidu' | 'ollama';

export const PROVIDER_IDS: readonly ProviderId[] = ['openai', 'anthropic', 'gemini', 'google', 'baidu', 'ollama'];

export type TranslationStyle = 'natural' | 'formal' | 'casual' | 'technical' | 'literary';

export const TRANSLATION_STYLES: readonly TranslationStyle[] = ['natural', 'formal', 'casual', 'technical', 'literary'];

export function isTranslationStyle(value: string): value is TranslationStyle {
  return TRANSLATION_STYLES.some(style => style === value);
}

export type OptionValue = string | number | boolean | null;

/**
 * Options that influence a provider's output. Every key takes part in the
 * cache fingerprint, so anything that does not change the translation
 * should stay out of here.
 */
export interface TranslateOptions {
  model?: string;
  style?: TranslationStyle;
  context?: string;
  [key: string]: OptionValue | undefined;
}

export interface TranslationRequest {
  text: string;
  /** Language code, or 'auto' to detect it */
  sourceLang: string;
  targetLang: string;
  providerId: string;
  model?: string;
  style?: TranslationStyle;
  options?: TranslateOptions;
}

export interface TranslationResult {
  readonly providerId: string;
  readonly model: string;
  readonly translatedText: string;
  readonly resolvedSourceLang: string;
  readonly targetLang: string;
  /** Heuristic quality in [0, 100] */
  readonly qualityScore: number;
  /** Provider-assumed confidence in [0, 1] */
  readonly confidenceScore: number;
  readonly processingTimeMs: number;
  readonly wordCount: number;
  readonly characterCount: number;
  readonly metadata: Readonly<Record<string, unknown>>;
}

/** What an adapter hands back before the orchestrator scores it. */
export type UnscoredTranslation = Omit<TranslationResult, 'qualityScore'>;

export interface ComparisonResult {
  sourceText: string;
  resolvedSourceLang: string;
  targetLang: string;
  results: Record<string, TranslationResult>;
  errors: Record<string, string>;
  best: TranslationResult | null;
}

export interface CompareOptions {
  timeoutMs?: number;
  options?: TranslateOptions;
}

export interface DetectionResult {
  language: string;
  probability: number;
}

export type JobStatus = 'pending' | 'processing' | 'completed' | 'failed';

export type ChunkStatus = JobStatus;

/**
 * How a piece of text attaches to the text before it: a new source line, the
 * next sentence on the same line, or the rest of an oversized sentence that
 * was cut at whitespace (`word`) or mid-word (`split`).
 */
export type ChunkBoundary = 'line' | 'sentence' | 'word' | 'split';

export interface ChunkRecord {
  jobId: string;
  index: number;
  sourceText: string;
  translatedText?: string;
  status: ChunkStatus;
  errorMessage?: string;
  /** How the chunk rejoins the one before it; a new line when absent */
  boundary?: ChunkBoundary;
}

export interface JobRecord {
  jobId: string;
  sourcePath?: string;
  fileFormat?: string;
  sourceLang: string;
  targetLang: string;
  providerId: string;
  status: JobStatus;
  progress: number;
  totalChunks: number;
  extractedText?: string;
  translatedText?: string;
  outputPath?: string;
  errorMessage?: string;
  createdAt: string;
  updatedAt: string;
  completedAt?: string;
}

export interface DocumentJob extends JobRecord {
  chunks: ChunkRecord[];
}

export interface DocumentJobRequest {
  jobId?: string;
  /** Inline text; when absent the text is extracted from sourcePath */
  text?: string;
  sourcePath?: string;
  fileFormat?: string;
  sourceLang: string;
  targetLang: string;
  providerId: string;
}
