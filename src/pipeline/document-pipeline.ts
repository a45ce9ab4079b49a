import { randomUUID } from 'crypto';
import path from 'path';
import { DEFAULT_SETTINGS } from '../config.js';
import {
  errorMessage,
  ExtractionError,
  JobCancelledError,
  JobConflictError,
  ReassemblyError,
  ValidationError,
} from '../errors.js';
import { createLogger, Logger } from '../logger.js';
import { Translator } from '../orchestrator.js';
import { ChunkRecord, DocumentJob, DocumentJobRequest, JobRecord } from '../types.js';
import { chunkText, reassembleChunks } from './chunker.js';
import { TextExtractor } from './extractor.js';
import { JobStore } from './job-store.js';
import { OutputWriter } from './output.js';

export interface DocumentPipelineOptions {
  translator: Translator;
  store: JobStore;
  extractor?: TextExtractor;
  output?: OutputWriter;
  chunkSize?: number;
  logger?: Logger;
  /** Called with a copy of the job after every save. */
  onProgress?: (job: JobRecord) => void;
}

/**
 * Translates documents chunk by chunk. A chunk that fails keeps its source
 * text and the job carries on; anything else that goes wrong fails the job.
 */
export class DocumentPipeline {
  private readonly translator: Translator;
  private readonly store: JobStore;
  private readonly extractor?: TextExtractor;
  private readonly output?: OutputWriter;
  private readonly chunkSize: number;
  private readonly log: Logger;
  private readonly onProgress?: (job: JobRecord) => void;

  private readonly running = new Map<string, Promise<DocumentJob>>();
  private readonly cancelled = new Set<string>();
  // Ids claimed by a startJob call that has not reached the store yet
  private readonly starting = new Set<string>();

  constructor(options: DocumentPipelineOptions) {
    this.translator = options.translator;
    this.store = options.store;
    this.extractor = options.extractor;
    this.output = options.output;
    this.chunkSize = options.chunkSize ?? DEFAULT_SETTINGS.chunkSize;
    this.log = options.logger ?? createLogger('DocumentPipeline');
    this.onProgress = options.onProgress;
  }

  async startJob(request: DocumentJobRequest): Promise<DocumentJob> {
    if (request.text === undefined && !request.sourcePath) {
      throw new ValidationError('A document job needs either text or a source path');
    }

    const jobId = request.jobId ?? randomUUID();
    if (this.starting.has(jobId) || this.running.has(jobId)) {
      throw new JobConflictError(`Job ${jobId} already exists`);
    }
    this.starting.add(jobId);
    try {
      return await this.createJob(jobId, request);
    } finally {
      this.starting.delete(jobId);
    }
  }

  private async createJob(jobId: string, request: DocumentJobRequest): Promise<DocumentJob> {
    if (await this.store.loadJob(jobId)) {
      throw new JobConflictError(`Job ${jobId} already exists`);
    }

    const now = new Date().toISOString();
    const job: JobRecord = {
      jobId,
      sourcePath: request.sourcePath,
      fileFormat: request.fileFormat ?? (request.sourcePath ? path.extname(request.sourcePath).slice(1).toLowerCase() : undefined),
      sourceLang: request.sourceLang,
      targetLang: request.targetLang,
      providerId: request.providerId,
      status: 'pending',
      progress: 0,
      totalChunks: 0,
      extractedText: request.text,
      createdAt: now,
      updatedAt: now,
    };
    await this.saveJob(job);
    this.log.info('Job created', { jobId, sourcePath: job.sourcePath });

    const snapshot: DocumentJob = { ...job, chunks: [] };

    const run = this.runJob(jobId).finally(() => this.running.delete(jobId));
    this.running.set(jobId, run);
    run.catch(error => this.log.error('Background job run failed', { jobId, error: errorMessage(error) }));

    return snapshot;
  }

  async runJob(jobId: string): Promise<DocumentJob> {
    const job = await this.store.loadJob(jobId);
    if (!job) {
      throw new JobConflictError(`Job ${jobId} not found`);
    }
    if (job.status !== 'pending') {
      throw new JobConflictError(`Job ${jobId} is ${job.status}, only pending jobs can run`);
    }

    try {
      await this.updateJob(job, { status: 'processing' });
      this.throwIfCancelled(jobId);

      const text = job.extractedText ?? await this.extract(job);
      const chunks = chunkText(text, this.chunkSize);
      await this.updateJob(job, { extractedText: text, totalChunks: chunks.length });

      for (const [index, { text: sourceText, boundary }] of chunks.entries()) {
        await this.store.saveChunk({ jobId, index, sourceText, boundary, status: 'pending' });
      }

      for (const [index, { text: sourceText, boundary }] of chunks.entries()) {
        this.throwIfCancelled(jobId);
        await this.updateJob(job, { progress: Math.floor((index / chunks.length) * 100) });
        await this.translateChunk(job, { jobId, index, sourceText, boundary, status: 'processing' });
      }

      const translatedText = await this.reassemble(job);
      const outputPath = this.output && job.sourcePath
        ? await this.output.write(job, translatedText)
        : undefined;

      await this.updateJob(job, {
        status: 'completed',
        progress: 100,
        translatedText,
        outputPath,
        completedAt: new Date().toISOString(),
      });
      this.log.info('Job completed', { jobId, chunks: chunks.length });
    } catch (error) {
      this.log.error('Job failed', { jobId, error: errorMessage(error) });
      await this.updateJob(job, { status: 'failed', errorMessage: errorMessage(error) });
    } finally {
      this.cancelled.delete(jobId);
    }

    return this.snapshot(job);
  }

  async getJobStatus(jobId: string): Promise<DocumentJob | undefined> {
    const job = await this.store.loadJob(jobId);
    return job ? this.snapshot(job) : undefined;
  }

  /**
   * Flags a pending or processing job; it stops before its next chunk.
   * Returns false when there is nothing to cancel.
   */
  async cancelJob(jobId: string): Promise<boolean> {
    const job = await this.store.loadJob(jobId);
    if (!job || job.status === 'completed' || job.status === 'failed') {
      return false;
    }
    this.cancelled.add(jobId);
    this.log.info('Job cancellation requested', { jobId });
    return true;
  }

  /** Resolves once a run started by `startJob` has finished. */
  async waitForJob(jobId: string): Promise<DocumentJob | undefined> {
    const run = this.running.get(jobId);
    return run ? run : this.getJobStatus(jobId);
  }

  private async extract(job: JobRecord): Promise<string> {
    if (!job.sourcePath) {
      throw new ExtractionError(`Job ${job.jobId} has neither text nor a source path`);
    }
    if (!this.extractor) {
      throw new ExtractionError('No text extractor is configured');
    }
    return this.extractor.extract(job.sourcePath, job.fileFormat ?? '');
  }

  private async translateChunk(job: JobRecord, chunk: ChunkRecord): Promise<void> {
    await this.store.saveChunk(chunk);

    let done: ChunkRecord;
    try {
      const result = await this.translator.translate({
        text: chunk.sourceText,
        sourceLang: job.sourceLang,
        targetLang: job.targetLang,
        providerId: job.providerId,
      });
      done = { ...chunk, status: 'completed', translatedText: result.translatedText };
      this.log.debug(`Chunk ${chunk.index + 1}/${job.totalChunks} translated`, { jobId: job.jobId });
    } catch (error) {
      this.log.warn(`Chunk ${chunk.index + 1}/${job.totalChunks} failed, keeping source text`, {
        jobId: job.jobId,
        error: errorMessage(error),
      });
      done = { ...chunk, status: 'failed', translatedText: chunk.sourceText, errorMessage: errorMessage(error) };
    }

    await this.store.saveChunk(done);
  }

  private async reassemble(job: JobRecord): Promise<string> {
    const chunks: ChunkRecord[] = [];
    for (let index = 0; index < job.totalChunks; index++) {
      const chunk = await this.store.loadChunk(job.jobId, index);
      if (!chunk || chunk.translatedText === undefined) {
        throw new ReassemblyError(`Chunk ${index} of job ${job.jobId} is missing`);
      }
      chunks.push(chunk);
    }
    return reassembleChunks(chunks);
  }

  private throwIfCancelled(jobId: string): void {
    if (this.cancelled.has(jobId)) {
      throw new JobCancelledError();
    }
  }

  private async updateJob(job: JobRecord, patch: Partial<JobRecord>): Promise<void> {
    Object.assign(job, patch, { updatedAt: new Date().toISOString() });
    await this.saveJob(job);
  }

  private async saveJob(job: JobRecord): Promise<void> {
    await this.store.saveJob(job);
    if (!this.onProgress) return;
    try {
      this.onProgress({ ...job });
    } catch (error) {
      this.log.warn('Progress listener threw', { jobId: job.jobId, error: errorMessage(error) });
    }
  }

  private async snapshot(job: JobRecord): Promise<DocumentJob> {
    const chunks: ChunkRecord[] = [];
    for (let index = 0; index < job.totalChunks; index++) {
      const chunk = await this.store.loadChunk(job.jobId, index);
      if (chunk) chunks.push(chunk);
    }
    return { ...job, chunks };
  }
}
