#!/usr/bin/env node
import { join } from 'node:path';
import { createInterface } from 'node:readline/promises';
import { Argument, Command, Option } from 'commander';
import { resolveConfig, type ConfigOverrides } from '../utils/config.js';
import { initLogger, getLogger } from '../utils/logger.js';
import { getHttpClient } from '../utils/http-client.js';
import { PaperStore } from '../storage/paper-store.js';
import { InterestStore } from '../storage/interest-store.js';
import { ArxivAdapter } from '../sources/arxiv.js';
import { PaperIngestor } from '../ingest/paper-ingestor.js';
import { InsightExtractor } from '../extraction/insight-extractor.js';
import { createLlmProvider } from '../llm/index.js';
import { addPaper } from '../builder/paper-builder.js';
import { NotFoundError } from '../utils/errors.js';
import {
    formatCandidate,
    formatCollection,
    formatInterests,
    formatPaperDetail,
    formatSearchResult,
    parseList,
} from './format.js';
import {
    PAPER_STATUSES,
    isPaperStatus,
    type InterestKind,
    type LogLevel,
    type PaperReaderConfig,
    type PaperStatus,
} from '../types/index.js';

const VERSION = '0.1.0';

type GlobalOptions = {
    dataDir?: string;
    logLevel?: LogLevel;
    jsonLogs?: boolean;
};

/**
 * Singular names accepted on the command line for each interest list.
 */
const INTEREST_KIND_ALIASES: Record<string, InterestKind> = {
    area: 'areas',
    topic: 'topics',
    category: 'arxiv_categories',
};

const program = new Command();

program
    .name('paper-reader')
    .description('Track research papers: discover, extract insights with an LLM, and keep a local collection.')
    .version(VERSION)
    .option('--data-dir <path>', 'Collection directory (default: ~/.paper-reader)')
    .addOption(new Option('--log-level <level>', 'Log level').choices(['debug', 'info', 'warn', 'error']))
    .option('--json-logs', 'Output JSON logs');

/**
 * Resolve configuration from the global flags and start the logger.
 */
async function setup(): Promise<PaperReaderConfig> {
    const opts = program.opts<GlobalOptions>();
    const overrides: ConfigOverrides = {};
    if (opts.dataDir) overrides.dataDir = opts.dataDir;
    if (opts.logLevel) overrides.logLevel = opts.logLevel;
    if (opts.jsonLogs) overrides.jsonLogs = true;

    const config = await resolveConfig(overrides);
    initLogger({ level: config.logLevel, jsonLogs: config.jsonLogs });
    getHttpClient({ timeout: 30000, version: VERSION, email: config.discovery.email });
    return config;
}

function openPaperStore(config: PaperReaderConfig): PaperStore {
    return new PaperStore(join(config.dataDir, 'papers'));
}

function openInterestStore(config: PaperReaderConfig): InterestStore {
    return new InterestStore(config.dataDir);
}

/**
 * Log a failed command and mark the process as failed.
 */
function fail(message: string, error?: unknown): void {
    if (error instanceof Error) {
        getLogger().error({ err: error }, `${message}: ${error.message}`);
    } else {
        getLogger().error(message);
    }
    process.exitCode = 1;
}

function parsePositiveInt(value: string, name: string): number {
    const parsed = parseInt(value, 10);
    if (isNaN(parsed) || parsed <= 0) {
        throw new Error(`${name} must be a positive integer, got "${value}"`);
    }
    return parsed;
}

// ─── INIT command ─────────────────────────────────────────

program
    .command('init')
    .description('Save research interests used for discovery')
    .option('-a, --areas <list>', 'Broad research areas, comma-separated (e.g. "deep learning, signal processing")')
    .option('-t, --topics <list>', 'Specific topics, comma-separated (e.g. "attention mechanisms, MIMO")')
    .option('-c, --categories <list>', 'arXiv categories, comma-separated (e.g. "cs.LG, eess.SP")')
    .action(async (opts: { areas?: string; topics?: string; categories?: string }) => {
        const config = await setup();
        try {
            const interests = {
                areas: parseList(opts.areas),
                topics: parseList(opts.topics),
                arxiv_categories: parseList(opts.categories),
            };
            openInterestStore(config).save(interests);

            console.log('\n✅ Interests saved!\n');
            console.log(formatInterests(interests));
        } catch (error) {
            fail('Saving interests failed', error);
        }
    });

// ─── INTERESTS command ────────────────────────────────────

const interestsCommand = program
    .command('interests')
    .description('Show or edit research interests');

interestsCommand
    .command('show')
    .description('Show saved interests')
    .action(async () => {
        const config = await setup();
        const interests = openInterestStore(config).load();
        if (!interests) {
            console.log("No interests configured. Run 'paper-reader init' first.");
            return;
        }
        console.log(formatInterests(interests));
    });

interestsCommand
    .command('add')
    .description('Add an area, topic, or category')
    .addArgument(new Argument('<kind>').choices(Object.keys(INTEREST_KIND_ALIASES)))
    .argument('<value>', 'Value to add')
    .action(async (kind: string, value: string) => {
        const config = await setup();
        const interestKind = INTEREST_KIND_ALIASES[kind];
        if (!interestKind) {
            fail(`Unknown interest kind: ${kind}`);
            return;
        }
        const changed = openInterestStore(config).add(interestKind, value.trim());
        console.log(changed ? `✅ Added ${kind}: ${value}` : `${kind} already present: ${value}`);
    });

interestsCommand
    .command('remove')
    .description('Remove an area, topic, or category')
    .addArgument(new Argument('<kind>').choices(Object.keys(INTEREST_KIND_ALIASES)))
    .argument('<value>', 'Value to remove')
    .action(async (kind: string, value: string) => {
        const config = await setup();
        const interestKind = INTEREST_KIND_ALIASES[kind];
        if (!interestKind) {
            fail(`Unknown interest kind: ${kind}`);
            return;
        }
        const changed = openInterestStore(config).remove(interestKind, value.trim());
        console.log(changed ? `✅ Removed ${kind}: ${value}` : `${kind} not present: ${value}`);
    });

// ─── DISCOVER command ─────────────────────────────────────

program
    .command('discover')
    .description('Discover recent arXiv papers matching your interests')
    .option('-d, --days <n>', 'Days to look back')
    .option('-m, --max-results <n>', 'Maximum papers to request')
    .action(async (opts: { days?: string; maxResults?: string }) => {
        const config = await setup();
        const interests = openInterestStore(config).load();
        if (!interests) {
            console.log("❌ No interests configured. Run 'paper-reader init' first.");
            process.exitCode = 1;
            return;
        }

        try {
            const days = opts.days ? parsePositiveInt(opts.days, '--days') : config.discovery.lookbackDays;
            const maxResults = opts.maxResults
                ? parsePositiveInt(opts.maxResults, '--max-results')
                : config.discovery.maxResults;

            const candidates = await new ArxivAdapter().discover(interests, days, maxResults);
            if (candidates.length === 0) {
                console.log('No papers found matching your interests.');
                return;
            }

            console.log(`Found ${candidates.length} papers:\n`);
            candidates.forEach((candidate, i) => {
                console.log(formatCandidate(candidate, i + 1));
                console.log('');
            });
            console.log('💡 Add papers with: paper-reader add <arxiv_id>');
        } catch (error) {
            fail('Discovery failed', error);
        }
    });

// ─── ADD command ──────────────────────────────────────────

program
    .command('add')
    .description('Add a paper by arXiv ID and extract insights')
    .argument('<arxivId>', 'arXiv ID, e.g. 2301.12345 or arxiv:2301.12345')
    .option('--pdf <path>', 'Use a local PDF instead of downloading')
    .action(async (arxivId: string, opts: { pdf?: string }) => {
        const config = await setup();
        try {
            const paper = await addPaper(
                {
                    source: new ArxivAdapter(),
                    ingestor: new PaperIngestor({ pdfDir: join(config.dataDir, 'pdfs') }),
                    extractor: new InsightExtractor(createLlmProvider(config.llm)),
                    store: openPaperStore(config),
                    interests: openInterestStore(config),
                },
                arxivId,
                opts.pdf ? { pdfPath: opts.pdf } : {}
            );

            console.log('\n✅ Paper added successfully!');
            console.log(`   Title: ${paper.title}`);
            console.log(`   Problem: ${paper.insights.problem.slice(0, 100)}...`);
            console.log(`   Classification: ${paper.insights.classification}`);
        } catch (error) {
            fail(`Adding ${arxivId} failed`, error);
        }
    });

// ─── LIST command ─────────────────────────────────────────

program
    .command('list')
    .description('List all papers in the collection')
    .addOption(
        new Option('-s, --status <status>', 'Only papers with this status').choices(PAPER_STATUSES)
    )
    .action(async (opts: { status?: string }) => {
        const config = await setup();
        const papers = openPaperStore(config).listAll();
        const shown = opts.status ? papers.filter((paper) => paper.status === opts.status) : papers;

        if (shown.length === 0) {
            console.log('No papers in collection yet.');
            console.log('💡 Discover papers with: paper-reader discover');
            return;
        }
        console.log('📚 Your Paper Collection\n');
        console.log(formatCollection(shown));
    });

// ─── SEARCH command ───────────────────────────────────────

program
    .command('search')
    .description('Search titles and insights (case-insensitive)')
    .argument('<query>', 'Text to look for')
    .action(async (query: string) => {
        const config = await setup();
        const results = openPaperStore(config).search(query);

        if (results.length === 0) {
            console.log('No papers found matching query.');
            return;
        }
        console.log(`Found ${results.length} papers:\n`);
        for (const paper of results) {
            console.log(formatSearchResult(paper));
            console.log('');
        }
    });

// ─── SHOW command ─────────────────────────────────────────

program
    .command('show')
    .description('Show a paper with its insights')
    .argument('<id>', 'Paper ID, e.g. arxiv:2301.12345v1')
    .action(async (id: string) => {
        const config = await setup();
        const paper = openPaperStore(config).get(id);
        if (!paper) {
            fail(`Paper ${id} not found`);
            return;
        }
        console.log(formatPaperDetail(paper));
    });

// ─── UPDATE-STATUS command ────────────────────────────────

program
    .command('update-status')
    .description('Set the reading status of a paper')
    .argument('<id>', 'Paper ID')
    .addArgument(new Argument('<status>').choices(PAPER_STATUSES))
    .action(async (id: string, status: string) => {
        const config = await setup();
        if (!isPaperStatus(status)) {
            fail(`Invalid status: ${status}`);
            return;
        }
        updatePaper(config, id, { status }, `Status: ${status}`);
    });

// ─── NOTE command ─────────────────────────────────────────

program
    .command('note')
    .description('Set or append to the notes of a paper')
    .argument('<id>', 'Paper ID')
    .argument('<text>', 'Note text')
    .option('--append', 'Append to existing notes instead of replacing them', false)
    .action(async (id: string, text: string, opts: { append: boolean }) => {
        const config = await setup();
        const existing = openPaperStore(config).get(id);
        const notes = opts.append && existing?.notes ? `${existing.notes}\n${text}` : text;
        updatePaper(config, id, { notes }, 'Notes saved');
    });

function updatePaper(
    config: PaperReaderConfig,
    id: string,
    changes: { status?: PaperStatus; notes?: string },
    summary: string
): void {
    try {
        const store = openPaperStore(config);
        const paper = store.get(id);
        if (!paper) throw new NotFoundError('paper', id);

        store.update({ ...paper, ...changes });
        console.log(`✅ Updated ${paper.title}`);
        console.log(`   ${summary}`);
    } catch (error) {
        fail(`Updating ${id} failed`, error);
    }
}

// ─── DELETE command ───────────────────────────────────────

program
    .command('delete')
    .description('Delete a paper from the collection')
    .argument('<id>', 'Paper ID')
    .option('-y, --yes', 'Do not ask for confirmation', false)
    .action(async (id: string, opts: { yes: boolean }) => {
        const config = await setup();
        const store = openPaperStore(config);
        const paper = store.get(id);
        if (!paper) {
            fail(`Paper ${id} not found`);
            return;
        }

        if (!opts.yes) {
            const rl = createInterface({ input: process.stdin, output: process.stdout });
            const answer = await rl.question(`Delete '${paper.title}'? [y/N] `);
            rl.close();
            if (!/^y(es)?$/i.test(answer.trim())) {
                console.log('Aborted.');
                return;
            }
        }

        try {
            store.delete(id);
            console.log('✅ Paper deleted');
        } catch (error) {
            fail(`Deleting ${id} failed`, error);
        }
    });

// ─── DOCTOR command ───────────────────────────────────────

program
    .command('doctor')
    .description('List record files that cannot be read')
    .action(async () => {
        const config = await setup();
        const store = openPaperStore(config);
        const unreadable = store.diagnose();

        if (unreadable.length === 0) {
            console.log(`All records in ${store.dataDir} are readable.`);
            return;
        }
        console.log(`${unreadable.length} unreadable record(s) in ${store.dataDir}:\n`);
        for (const { file, reason } of unreadable) {
            console.log(`  ${file}: ${reason}`);
        }
        process.exitCode = 1;
    });

await program.parseAsync();
