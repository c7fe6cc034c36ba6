import 'dotenv/config';
import cors from 'cors';
import express from 'express';
import multer from 'multer';
import http from 'http';
import { resolve } from 'path';
import { WebSocket, WebSocketServer } from 'ws';
import { z } from 'zod';
import { CacheStore, MemoryCacheStore } from './cache.store';
import { ServiceConfig, loadServiceConfig, parsePipelineOptions } from './config';
import { MongoCacheStore, connectDB } from './db';
import { ConfigError, InputFormatError } from './errors';
import { createPipeline } from './index';
import { DeckJobData, DeckJobEvent, createDeckJob, createDeckQueue, jobEvents, startWorker, tablePathFor } from './jobs';
import { decodeTermSource, parseTerms } from './term.parser';

const RegisterMessage = z.object({ type: z.literal('register'), jobId: z.string().min(1) });

export interface DeckService {
    submit(data: DeckJobData): Promise<string>;
    status(jobId: string): Promise<{ state: string; tablePath?: string } | undefined>;
}

export function createApp(service: DeckService): express.Express {
    const app = express();
    app.use(cors());
    app.use(express.json());
    const upload = multer({ storage: multer.memoryStorage(), limits: { fileSize: 1024 * 1024 } });

    app.post('/api/jobs', upload.single('termFile'), async (req, res) => {
        if (!req.file) return res.status(400).json({ error: 'Term file is required.' });

        try {
            const rawOptions: unknown = req.body?.options;
            const options = parsePipelineOptions(JSON.parse(typeof rawOptions === 'string' ? rawOptions : '{}'));
            const termList = decodeTermSource(req.file.buffer, req.file.originalname);
            if (![...parseTerms(termList, options)].length) {
                return res.status(400).json({ error: 'Term file contains no terms.' });
            }
            const jobId = await service.submit({ fileName: req.file.originalname, termList, options });
            res.status(202).json({ jobId });
        } catch (error) {
            if (error instanceof ConfigError) return res.status(400).json({ error: 'Invalid options.', issues: error.issues });
            if (error instanceof InputFormatError || error instanceof SyntaxError) {
                return res.status(400).json({ error: error.message });
            }
            console.error('[server] Failed to create job:', error);
            res.status(500).json({ error: 'Failed to create job.' });
        }
    });

    app.get('/api/jobs/:jobId/table', async (req, res) => {
        try {
            const status = await service.status(req.params.jobId);
            if (!status) return res.status(404).json({ error: 'Job not found.' });
            if (!status.tablePath) return res.status(409).json({ error: `Job is ${status.state}.` });
            res.download(resolve(status.tablePath));
        } catch (error) {
            console.error('[server] Failed to look up job:', error);
            res.status(500).json({ error: 'Failed to look up job.' });
        }
    });

    return app;
}

export function attachProgressFeed(server: http.Server): WebSocketServer {
    const wss = new WebSocketServer({ server });

    wss.on('connection', ws => {
        console.log('[server] Client connected via WebSocket');
        ws.on('message', message => {
            let data: z.infer<typeof RegisterMessage>;
            try {
                data = RegisterMessage.parse(JSON.parse(message.toString()));
            } catch {
                console.error('[server] Ignoring malformed WebSocket message:', message.toString());
                return;
            }

            const { jobId } = data;
            console.log(`[server] Client registered for job ${jobId}`);
            const listener = (event: DeckJobEvent) => {
                if (ws.readyState === WebSocket.OPEN) ws.send(JSON.stringify(event));
            };
            jobEvents.on(jobId, listener);
            ws.on('close', () => {
                console.log(`[server] Client for job ${jobId} disconnected.`);
                jobEvents.removeListener(jobId, listener);
            });
        });
    });
    return wss;
}

async function bootstrap(config: ServiceConfig) {
    let cache: CacheStore = new MemoryCacheStore();
    if (config.mongodbUri) {
        await connectDB(config.mongodbUri);
        cache = new MongoCacheStore();
    }

    const queue = createDeckQueue(config.redis);
    startWorker(config.redis, {
        config,
        createPipeline: onStage => createPipeline(config, { cache, onStage }),
    });

    const service: DeckService = {
        submit: async data => {
            const job = await createDeckJob(queue, data);
            return job.id ?? '';
        },
        status: async jobId => {
            const job = await queue.getJob(jobId);
            if (!job) return undefined;
            const state = await job.getState();
            return state === 'completed' ? { state, tablePath: tablePathFor(config.outputDir, jobId) } : { state };
        },
    };

    const server = http.createServer(createApp(service));
    attachProgressFeed(server);
    server.listen(config.port, () => {
        console.log(`[server] Deck service with WebSocket listening on port ${config.port}`);
    });
}

if (require.main === module) {
    bootstrap(loadServiceConfig()).catch((error: unknown) => {
        console.error('[server] Failed to start:', error);
        process.exitCode = 1;
    });
}
