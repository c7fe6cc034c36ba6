#!/usr/bin/env node
import 'dotenv/config';
import { resolve } from 'path';
import { FileCacheStore } from './cache.store';
import { USAGE, parseCommandLine } from './cli.args';
import { loadServiceConfig } from './config';
import { PipelineError } from './errors';
import { createPipeline, toRunOptions } from './index';

async function main(argv: string[]): Promise<number> {
    if (argv.includes('--help') || argv.includes('-h')) {
        console.log(USAGE);
        return 0;
    }
    const args = parseCommandLine(argv);
    if (!args.input || !args.output) {
        console.error(USAGE);
        return 2;
    }

    const config = loadServiceConfig();
    const controller = new AbortController();
    process.once('SIGINT', () => {
        console.log('\nStopping after in-flight requests finish...');
        controller.abort();
    });

    const pipeline = createPipeline(config, {
        cache: args.cache ? new FileCacheStore(resolve(args.cache)) : undefined,
        onStage: stage => args.verbose && console.log(`[pipeline] ${stage}`),
    });
    const summary = await pipeline.run(toRunOptions(args.options, {
        input: { path: resolve(args.input) },
        outputPath: resolve(args.output),
        mediaDir: resolve(args.mediaDir ?? config.mediaDir),
        signal: controller.signal,
        verbose: args.verbose,
    }, config.voices));

    for (const failure of summary.failed) {
        console.error(`  ${failure.text}: ${failure.code} (${failure.stage}) ${failure.message}`);
    }
    return summary.status === 'cancelled' ? 130 : 0;
}

if (require.main === module) {
    main(process.argv.slice(2))
        .then(code => { process.exitCode = code; })
        .catch((error: unknown) => {
            if (error instanceof PipelineError) {
                console.error(`${error.name}: ${error.message}`);
            } else {
                console.error('Fatal error:', error);
            }
            process.exitCode = 1;
        });
}
