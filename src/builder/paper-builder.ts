import type { PaperRecord, SourceAdapter } from '../types/index.js';
import type { InsightExtractor } from '../extraction/insight-extractor.js';
import type { PaperIngestor } from '../ingest/paper-ingestor.js';
import type { InterestStore } from '../storage/interest-store.js';
import type { PaperStore } from '../storage/paper-store.js';
import { AlreadyExistsError, NotFoundError } from '../utils/errors.js';
import { getLogger } from '../utils/logger.js';

/**
 * Collaborators used to add a paper. Narrowed to the methods called so tests can pass fakes.
 */
export interface PaperBuilderDeps {
    source: SourceAdapter;
    ingestor: Pick<PaperIngestor, 'ingest' | 'ingestLocal'>;
    extractor: Pick<InsightExtractor, 'extract'>;
    store: Pick<PaperStore, 'get' | 'create'>;
    interests: Pick<InterestStore, 'load'>;
    now?: () => Date;
}

export interface AddPaperOptions {
    /** Use this local PDF instead of downloading one */
    pdfPath?: string;
}

/**
 * Add one paper to the collection:
 *
 * 1. Fetch metadata from the source
 * 2. Download (or read) the PDF and extract its text
 * 3. Extract insights with the LLM
 * 4. Persist the record with status "to-read"
 */
export async function addPaper(deps: PaperBuilderDeps, paperId: string, options: AddPaperOptions = {}): Promise<PaperRecord> {
    const logger = getLogger();

    // ──────────────────────────────────────────────────
    // Step 1: Metadata
    // ──────────────────────────────────────────────────
    logger.info({ paperId }, 'Fetching metadata');
    const candidate = await deps.source.getById(paperId);
    if (!candidate) {
        throw new NotFoundError('paper', paperId);
    }

    // Checked before the expensive steps; create() still enforces it
    if (deps.store.get(candidate.id)) {
        throw new AlreadyExistsError(candidate.id);
    }

    // ──────────────────────────────────────────────────
    // Step 2: Text
    // ──────────────────────────────────────────────────
    let pdfPath: string;
    let text: string;
    if (options.pdfPath) {
        logger.info({ pdfPath: options.pdfPath }, 'Reading local PDF');
        pdfPath = options.pdfPath;
        text = await deps.ingestor.ingestLocal(options.pdfPath);
    } else {
        ({ pdfPath, text } = await deps.ingestor.ingest(candidate));
    }
    logger.info({ pdfPath, characters: text.length }, 'Text extracted');

    // ──────────────────────────────────────────────────
    // Step 3: Insights
    // ──────────────────────────────────────────────────
    logger.info({ title: candidate.title }, 'Extracting insights');
    const insights = await deps.extractor.extract(text, candidate.title);

    // ──────────────────────────────────────────────────
    // Step 4: Persist
    // ──────────────────────────────────────────────────
    const interests = deps.interests.load();
    const paper: PaperRecord = {
        id: candidate.id,
        title: candidate.title,
        authors: candidate.authors,
        url: candidate.url,
        pdf_path: pdfPath,
        added_date: (deps.now ?? (() => new Date()))().toISOString(),
        interests: interests?.topics ?? [],
        insights,
        status: 'to-read',
        notes: '',
    };

    deps.store.create(paper);
    logger.info({ id: paper.id, classification: insights.classification }, 'Paper added');
    return paper;
}
