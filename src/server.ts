import express, { type Request, type Response, type NextFunction } from 'express';
import path from 'path';
import * as fs from 'fs';
import { queue as asyncQueue, type QueueObject } from 'async';
import { uploadMiddleware, parseSeedForm, STORAGE_DIR, UPLOAD_PREFIX } from './middleware/upload';
import { countRecords } from './parsers/csvParser';
import { createSeederConfig } from './config/seederConfig';
import { closeDb } from './db/postgres';
import { createDefaultDependencies, runSeeder, type SeederDependencies } from './seeder';
import { createConsoleReporter, createMemoryReporter, teeReporter, type ReportedMessage } from './seeder/reporter';
import { errorMessage, SeederConfigError } from './seeder/errors';
import type { ReportingSink, RunResult } from './types/csv';
import type { SeederOptions } from './types/schema';

const PORT = process.env.PORT || 3001;
const STORAGE_MAX_AGE_MS = parseInt(process.env.STORAGE_MAX_AGE_MS || '3600000', 10); // 1 hour default
const JOB_RESULT_TTL = 3600000; // Keep results for 1 hour

export interface SeedJob {
  id: string;
  filePath: string;
  originalName: string;
  options: SeederOptions;
}

export type JobStatus = 'queued' | 'processing' | RunResult['status'];

export interface RunSummary {
  status: RunResult['status'];
  tableName?: string;
  totalRows?: number;
  insertedRows?: number;
  flushedRows?: number;
  skippedRows?: number;
  error?: string;
}

export interface JobRecord {
  id: string;
  status: JobStatus;
  originalName: string;
  tableName?: string;
  totalRecords?: number;
  createdAt: string;
  updatedAt?: string;
  result?: RunSummary;
  messages?: ReportedMessage[];
}

/**
 * JSON-safe view of a run result.
 */
export function summarizeResult(result: RunResult): RunSummary {
  switch (result.status) {
    case 'completed':
      return {
        status: result.status,
        tableName: result.tableName,
        totalRows: result.totalRows,
        insertedRows: result.insertedRows,
        skippedRows: result.rowErrors.length,
      };
    case 'failed':
      return {
        status: result.status,
        tableName: result.tableName,
        totalRows: result.totalRows,
        insertedRows: result.insertedRows,
        flushedRows: result.flushedRows,
        error: result.error.message,
      };
    case 'invalid':
      return { status: result.status, error: result.message };
  }
}

function cleanupFile(filePath: string): void {
  if (filePath && fs.existsSync(filePath)) {
    try {
      fs.unlinkSync(filePath);
      console.log(`[Cleanup] Deleted temporary file: ${filePath}`);
    } catch (unlinkError) {
      console.error('[Cleanup] Error deleting temp file:', unlinkError);
    }
  }
}

/**
 * Clean up old files in storage directory (handles orphaned files from crashes)
 */
export function cleanupOldStorageFiles(): void {
  try {
    if (!fs.existsSync(STORAGE_DIR)) {
      return;
    }

    const files = fs.readdirSync(STORAGE_DIR);
    const now = Date.now();
    let cleanedCount = 0;

    for (const file of files) {
      if (!file.startsWith(UPLOAD_PREFIX)) {
        continue; // Skip non-upload files
      }

      const filePath = path.join(STORAGE_DIR, file);
      try {
        const stats = fs.statSync(filePath);
        if (now - stats.mtimeMs > STORAGE_MAX_AGE_MS) {
          fs.unlinkSync(filePath);
          cleanedCount++;
        }
      } catch (err) {
        console.error(`[Cleanup] Error processing file ${file}:`, err);
      }
    }

    if (cleanedCount > 0) {
      console.log(`[Cleanup] Removed ${cleanedCount} orphaned file(s) from storage`);
    }
  } catch (err) {
    console.error('[Cleanup] Error cleaning storage directory:', err);
  }
}

/**
 * Run one queued seed job; the uploaded file is removed afterwards.
 */
export async function processSeedJob(job: SeedJob, deps: SeederDependencies): Promise<RunResult> {
  console.log(`[Queue] Seeding ${job.originalName} into "${job.options.tableName ?? ''}" (job ${job.id})`);

  try {
    return await runSeeder(job.options, deps);
  } finally {
    cleanupFile(job.filePath);
  }
}

/**
 * HTTP front end for seeding: upload a CSV, poll the job.
 * Jobs run one at a time, so two uploads never write to the database together.
 */
export function createApp(
  createDeps: (reporter: ReportingSink) => SeederDependencies = createDefaultDependencies
): express.Express {
  const app = express();
  const jobs = new Map<string, JobRecord>();

  const updateJob = (id: string, updates: Partial<JobRecord>): void => {
    const current = jobs.get(id);
    if (current) {
      jobs.set(id, { ...current, ...updates, updatedAt: new Date().toISOString() });
    }
  };

  const seedQueue: QueueObject<SeedJob> = asyncQueue(async (job: SeedJob) => {
    console.log(`[Queue] Starting job (queue length: ${seedQueue.length()}, running: ${seedQueue.running()})`);
    updateJob(job.id, { status: 'processing' });

    const memory = createMemoryReporter();
    const deps = createDeps(teeReporter(createConsoleReporter(), memory));

    try {
      const result = await processSeedJob(job, deps);
      updateJob(job.id, { status: result.status, result: summarizeResult(result), messages: memory.messages });
    } catch (error) {
      updateJob(job.id, {
        status: 'failed',
        result: { status: 'failed', error: errorMessage(error) },
        messages: memory.messages,
      });
      throw error;
    }
  }, 1);

  seedQueue.error((err, job) => {
    console.error(`[Queue] Job ${job.id} failed with error:`, err);
  });

  seedQueue.drain(() => {
    console.log('[Queue] All jobs processed, queue is now empty');
  });

  app.use(express.json());

  app.get('/health', (req: Request, res: Response): void => {
    res.json({
      status: 'ok',
      queue: {
        length: seedQueue.length(),
        running: seedQueue.running(),
        idle: seedQueue.idle(),
      },
    });
  });

  /**
   * API: Upload a CSV file and queue it for seeding (returns job ID for polling)
   */
  app.post('/api/seed', uploadMiddleware, async (req: Request, res: Response, next: NextFunction): Promise<void> => {
    const file = req.file;
    if (!file) {
      next(new Error('No file uploaded'));
      return;
    }

    const jobId = `job-${Date.now()}-${Math.round(Math.random() * 1e9)}`;
    console.log(`[API] File uploaded: ${file.path} (${file.originalname}), job ID: ${jobId}`);

    try {
      const options = parseSeedForm(req.body, file.path);
      const config = createSeederConfig(options);
      const totalRecords = await countRecords(file.path, config.delimiter, config.hasHeader);

      jobs.set(jobId, {
        id: jobId,
        status: 'queued',
        originalName: file.originalname,
        tableName: options.tableName,
        totalRecords,
        createdAt: new Date().toISOString(),
      });

      const timer = setTimeout(() => {
        jobs.delete(jobId);
        console.log(`[API] Cleaned up job result: ${jobId}`);
      }, JOB_RESULT_TTL);
      timer.unref();

      seedQueue.push({ id: jobId, filePath: file.path, originalName: file.originalname, options });

      res.status(202).json({
        success: true,
        jobId,
        status: 'queued',
        queuePosition: seedQueue.length(),
        totalRecords,
        statusUrl: `/api/status/${jobId}`,
      });
    } catch (error) {
      cleanupFile(file.path);

      if (error instanceof SeederConfigError) {
        res.status(400).json({ success: false, error: error.message });
        return;
      }

      console.error('[API] Error:', errorMessage(error));
      next(error);
    }
  });

  /**
   * API: Check job status
   */
  app.get('/api/status/:jobId', (req: Request, res: Response): void => {
    const job = jobs.get(req.params.jobId);

    if (!job) {
      res.status(404).json({
        success: false,
        error: 'Job not found or expired',
      });
      return;
    }

    res.json({
      success: true,
      job,
    });
  });

  app.use((err: Error, req: Request, res: Response, next: NextFunction): void => {
    console.error('Error:', err);
    res.status(500).json({ error: err.message || 'Internal server error' });
  });

  return app;
}

async function shutdown(signal: string): Promise<void> {
  console.log(`${signal} received, closing database pool...`);
  await closeDb();
  process.exit(0);
}

if (require.main === module) {
  cleanupOldStorageFiles();

  for (const signal of ['SIGTERM', 'SIGINT'] as const) {
    process.on(signal, () => {
      shutdown(signal).catch((err) => {
        console.error('[Shutdown] Pool close failed:', err);
        process.exit(1);
      });
    });
  }

  createApp().listen(PORT, () => {
    console.log(`CSV seed server running on port ${PORT}`);
    console.log(`Uploads stored in ${STORAGE_DIR}`);
  });
}
