import { ChunkRecord, JobRecord } from '../types.js';

/** Persistence for document jobs and their chunks. */
export interface JobStore {
  loadJob(jobId: string): Promise<JobRecord | undefined>;
  saveJob(job: JobRecord): Promise<void>;
  loadChunk(jobId: string, index: number): Promise<ChunkRecord | undefined>;
  saveChunk(chunk: ChunkRecord): Promise<void>;
}

/** In-process store. Records go in and come out as copies. */
export class MemoryJobStore implements JobStore {
  private readonly jobs = new Map<string, JobRecord>();
  private readonly chunks = new Map<string, ChunkRecord>();

  async loadJob(jobId: string): Promise<JobRecord | undefined> {
    const job = this.jobs.get(jobId);
    return job ? structuredClone(job) : undefined;
  }

  async saveJob(job: JobRecord): Promise<void> {
    this.jobs.set(job.jobId, structuredClone(job));
  }

  async loadChunk(jobId: string, index: number): Promise<ChunkRecord | undefined> {
    const chunk = this.chunks.get(chunkKey(jobId, index));
    return chunk ? structuredClone(chunk) : undefined;
  }

  async saveChunk(chunk: ChunkRecord): Promise<void> {
    this.chunks.set(chunkKey(chunk.jobId, chunk.index), structuredClone(chunk));
  }
}

function chunkKey(jobId: string, index: number): string {
  return `${jobId}:${index}`;
}
