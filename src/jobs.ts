import { ConnectionOptions, Queue, Worker } from 'bullmq';
import { EventEmitter } from 'events';
import { join } from 'path';
import { PipelineOptions, ServiceConfig } from './config';
import { describeError } from './errors';
import { toRunOptions } from './index';
import { PipelineOrchestrator } from './pipeline.orchestrator';
import { RunPhase, RunSummary } from './types';

export const DECK_QUEUE = 'flashcard-decks';

export const jobEvents = new EventEmitter();

export type DeckJobEvent =
    | { type: 'progress'; payload: { stage: string; phase: RunPhase } }
    | { type: 'completed'; payload: { summary: RunSummary } }
    | { type: 'failed'; payload: { error: string } };

export interface DeckJobData {
    jobId?: string;
    fileName: string;
    termList: string;
    options: PipelineOptions;
}

/** The parts of a bullmq `Job` the processor touches. */
export interface DeckJobHandle {
    id?: string;
    data: DeckJobData;
    updateProgress(progress: number | object): Promise<void>;
}

export interface DeckRunner {
    config: Pick<ServiceConfig, 'mediaDir' | 'outputDir' | 'voices'>;
    createPipeline(onStage: (stage: string, phase: RunPhase) => void): PipelineOrchestrator;
}

export const tablePathFor = (outputDir: string, jobId: string) => join(outputDir, `${jobId}.txt`);

export function createDeckQueue(connection: ConnectionOptions): Queue<DeckJobData, RunSummary> {
    return new Queue<DeckJobData, RunSummary>(DECK_QUEUE, { connection });
}

export async function createDeckJob(queue: Queue<DeckJobData, RunSummary>, data: DeckJobData) {
    const job = await queue.add('build-deck', data, {
        attempts: 2,
        backoff: { type: 'exponential', delay: 10000 },
    });
    await job.updateData({ ...job.data, jobId: job.id });
    return job;
}

export async function processDeckJob(job: DeckJobHandle, runner: DeckRunner): Promise<RunSummary> {
    const jobId = job.id ?? job.data.jobId ?? 'unknown';
    const emit = (event: DeckJobEvent) => jobEvents.emit(jobId, event);

    const updateStage = (stage: string, phase: RunPhase) => {
        job.updateProgress({ stage, phase }).catch((error: unknown) => {
            console.error(`[worker] Could not record progress for job ${jobId}:`, error);
        });
        emit({ type: 'progress', payload: { stage, phase } });
    };

    try {
        const pipeline = runner.createPipeline(updateStage);
        const summary = await pipeline.run(toRunOptions(job.data.options, {
            input: { content: job.data.termList },
            outputPath: tablePathFor(runner.config.outputDir, jobId),
            mediaDir: runner.config.mediaDir,
        }, runner.config.voices));

        emit({ type: 'completed', payload: { summary } });
        return summary;
    } catch (error) {
        emit({ type: 'failed', payload: { error: describeError(error).message } });
        throw error;
    }
}

export function startWorker(connection: ConnectionOptions, runner: DeckRunner, concurrency = 1): Worker<DeckJobData, RunSummary> {
    console.log('[worker] Deck worker started...');
    const worker = new Worker<DeckJobData, RunSummary>(DECK_QUEUE, job => processDeckJob(job, runner), { connection, concurrency });
    worker.on('failed', (job, error) => console.error(`[worker] Job ${job?.id} (${job?.data.fileName}) failed: ${error.message}`));
    return worker;
}
