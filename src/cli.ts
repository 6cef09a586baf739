import { Command } from 'commander';
import * as fs from 'fs';
import * as path from 'path';
import { z } from 'zod';

import { getConfig } from './config';
import { getIndustryProfile, loadIndustryCatalog } from './config/catalog';
import { NominatimGeocoder, loadComuni } from './core/discovery/geo';
import { GooglePlacesProvider } from './core/discovery/google_places_provider';
import { PlacesDetailsCache } from './core/discovery/places_details_cache';
import { partitionContacts } from './core/enrichment/email_extractor';
import { AdminPass } from './pipeline/admin_pass';
import {
    buildAdminFinder,
    buildExtractor,
    buildFetcher,
    buildLimiter,
    buildOrchestrator,
    buildServices,
} from './pipeline/factory';
import { PipelineRunner } from './pipeline/pipeline_runner';
import { ProcessedComuniLog } from './storage/checkpoint';
import { RawCompany, RawCompanySchema } from './types';
import { ConfigurationError, PipelineError, ValidationError } from './utils/errors';
import { Logger } from './utils/logger';
import { ShutdownHandler } from './utils/shutdown_handler';

const program = new Command();

const RunOptionsSchema = z.object({
    industry: z.string().min(1),
    comuni: z.string().min(1),
    radius: z.coerce.number().positive().default(5),
    limit: z.coerce.number().int().positive().optional(),
    parallel: z.boolean().default(false),
    concurrency: z.coerce.number().int().min(1).max(100).optional(),
    withAdmin: z.boolean().default(false),
    shuffle: z.boolean().default(false),
    slugFallback: z.boolean().default(true),
    output: z.string().optional(),
});

const EnrichOptionsSchema = RunOptionsSchema.pick({
    industry: true,
    parallel: true,
    concurrency: true,
    withAdmin: true,
    slugFallback: true,
    output: true,
});

const ScoreOptionsSchema = z
    .object({ industry: z.string().min(1), url: z.string().optional(), text: z.string().optional() })
    .refine((o) => o.url !== undefined || o.text !== undefined, 'one of --url or --text is required');

const AdminOptionsSchema = z.object({
    output: z.string().optional(),
    force: z.boolean().default(false),
    limit: z.coerce.number().int().positive().optional(),
});

function parseOptions<S extends z.ZodTypeAny>(schema: S, raw: unknown): z.output<S> {
    const result = schema.safeParse(raw);
    if (!result.success) {
        throw new ValidationError(result.error.issues.map((i) => `${i.path.join('.') || 'options'}: ${i.message}`).join('; '));
    }
    return result.data;
}

function defaultOutput(industry: string, outputDir: string): string {
    return path.resolve(outputDir, `aziende_${industry}.csv`);
}

async function main(action: () => Promise<void>) {
    try {
        await action();
    } catch (e) {
        if (e instanceof PipelineError && e.fatal) {
            Logger.fatal(`❌ [${e.code}] ${e.message}`);
        } else {
            Logger.logError('Fatal error', e);
        }
        process.exitCode = 1;
    }
}

program
    .name('lead-enricher')
    .description('Lead discovery and enrichment for Italian SMEs')
    .version('1.0.0');

program
    .command('run')
    .description('Discover companies in each comune and enrich them into the output CSV')
    .requiredOption('-i, --industry <name>', 'industry vertical (see data/industries.json)')
    .requiredOption('-c, --comuni <path>', 'CSV (denominazione_ita/comune column) or text file of comuni')
    .option('-r, --radius <km>', 'search radius in km (clamped to 2-10)', '5')
    .option('-l, --limit <n>', 'process at most n comuni')
    .option('-p, --parallel', 'enrich candidates with a worker pool')
    .option('--concurrency <n>', 'worker pool size in parallel mode')
    .option('--with-admin', 'look up the administrator name for each company')
    .option('--shuffle', 'process comuni in random order')
    .option('--no-slug-fallback', 'do not probe conventional contact slugs')
    .option('-o, --output <path>', 'output CSV path')
    .action((raw: unknown) =>
        main(async () => {
            const opts = parseOptions(RunOptionsSchema, raw);
            const config = getConfig();
            if (!config.GOOGLE_PLACES_API_KEY) {
                throw new ConfigurationError('GOOGLE_PLACES_API_KEY is required for discovery');
            }
            const profile = getIndustryProfile(loadIndustryCatalog(), opts.industry);
            const comuni = loadComuni(opts.comuni);
            const outputPath = opts.output ? path.resolve(opts.output) : defaultOutput(opts.industry, config.OUTPUT_DIR);

            const limiter = buildLimiter(config);
            const orchestrator = await buildOrchestrator(config, {
                industry: opts.industry,
                outputPath,
                withAdmin: opts.withAdmin,
                disableSlugFallback: !opts.slugFallback,
                limiter,
            });
            ShutdownHandler.init(() => orchestrator.stop());

            const placesCache = new PlacesDetailsCache(path.resolve(config.CACHE_DIR, 'places_details_cache.json'));
            const runner = new PipelineRunner({
                provider: new GooglePlacesProvider({ apiKey: config.GOOGLE_PLACES_API_KEY, cache: placesCache, limiter }),
                geocoder: new NominatimGeocoder({ limiter }),
                orchestrator,
                comuniLog: new ProcessedComuniLog(path.resolve(config.LOG_DIR, 'comuni_elaborati.csv')),
                placesCache,
            });

            Logger.info(`🚀 ${opts.industry}: ${comuni.length} comuni → ${outputPath}`);
            const summary = await runner.run(comuni, {
                keywords: profile.searchKeywords,
                radiusKm: opts.radius,
                parallel: opts.parallel,
                concurrency: opts.concurrency ?? config.CONCURRENCY_LIMIT,
                limitComuni: opts.limit,
                shuffle: opts.shuffle,
            });
            if (summary) Logger.info('📊 summary', { ...summary });
        })
    );

program
    .command('enrich <records>')
    .description('Enrich raw company records from a JSON array file')
    .requiredOption('-i, --industry <name>', 'industry vertical')
    .option('-p, --parallel', 'enrich candidates with a worker pool')
    .option('--concurrency <n>', 'worker pool size in parallel mode')
    .option('--with-admin', 'look up the administrator name for each company')
    .option('--no-slug-fallback', 'do not probe conventional contact slugs')
    .option('-o, --output <path>', 'output CSV path')
    .action((recordsPath: string, raw: unknown) =>
        main(async () => {
            const opts = parseOptions(EnrichOptionsSchema, raw);
            const config = getConfig();
            const records = parseOptions(z.array(z.unknown()), JSON.parse(fs.readFileSync(recordsPath, 'utf-8')))
                .map((r) => RawCompanySchema.safeParse(r))
                .flatMap((r): RawCompany[] => (r.success ? [r.data] : []));
            const outputPath = opts.output ? path.resolve(opts.output) : defaultOutput(opts.industry, config.OUTPUT_DIR);

            const orchestrator = await buildOrchestrator(config, {
                industry: opts.industry,
                outputPath,
                withAdmin: opts.withAdmin,
                disableSlugFallback: !opts.slugFallback,
            });
            ShutdownHandler.init(() => orchestrator.stop());

            const summary = opts.parallel
                ? await orchestrator.runParallel(records, opts.concurrency ?? config.CONCURRENCY_LIMIT)
                : await orchestrator.runSequential(records);
            Logger.info('📊 summary', { ...summary });
        })
    );

program
    .command('score')
    .description('Score a website (--url) or a text snippet (--text) against an industry')
    .requiredOption('-i, --industry <name>', 'industry vertical')
    .option('-u, --url <url>', 'website to analyse')
    .option('-t, --text <text>', 'text snippet to analyse')
    .action((raw: unknown) =>
        main(async () => {
            const opts = parseOptions(ScoreOptionsSchema, raw);
            const { scorer } = buildServices(getConfig(), opts.industry);
            const result = opts.url !== undefined ? await scorer.analyzeWebsite(opts.url) : scorer.analyzeText(opts.text ?? '');
            process.stdout.write(`${JSON.stringify(result, null, 2)}\n`);
        })
    );

program
    .command('emails <url>')
    .description('Extract contact emails and LinkedIn links from a website')
    .option('--no-slug-fallback', 'do not probe conventional contact slugs')
    .action((url: string, raw: unknown) =>
        main(async () => {
            const opts = parseOptions(z.object({ slugFallback: z.boolean().default(true) }), raw);
            const config = getConfig();
            const extractor = buildExtractor(config, buildFetcher(config, buildLimiter(config)));
            const found = await extractor.extract(url, { disableSlugFallback: !opts.slugFallback });
            process.stdout.write(`${JSON.stringify(partitionContacts(found), null, 2)}\n`);
        })
    );

program
    .command('admin <csv>')
    .description('Fill the contatto column of an output CSV with administrator names')
    .option('-o, --output <path>', 'output CSV (default: <input>_admin.csv)')
    .option('-f, --force', 'also look up rows that already have a contatto')
    .option('-l, --limit <n>', 'look up at most n rows')
    .action((csv: string, raw: unknown) =>
        main(async () => {
            const opts = parseOptions(AdminOptionsSchema, raw);
            const config = getConfig();
            const input = path.resolve(csv);
            const output = opts.output ? path.resolve(opts.output) : input.replace(/\.csv$/i, '') + '_admin.csv';
            const pass = new AdminPass(buildAdminFinder(config));
            await pass.run(input, output, { force: opts.force, limit: opts.limit });
        })
    );

void program.parseAsync(process.argv);
