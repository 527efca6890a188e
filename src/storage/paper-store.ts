import { existsSync, mkdirSync, readdirSync, unlinkSync } from 'node:fs';
import { join } from 'node:path';
import { PaperRecordSchema, type PaperRecord } from '../types/index.js';
import { AlreadyExistsError, NotFoundError, RecordValidationError } from '../utils/errors.js';
import { readJsonFile, writeJsonFile } from './json-file.js';

/**
 * A record file that could not be loaded.
 */
export interface UnreadableRecord {
    file: string;
    reason: string;
}

/**
 * Map a paper id to its file name. `:` and `/` are not safe in file names.
 */
export function paperFileName(paperId: string): string {
    return `${paperId.replace(/[:/]/g, '_')}.json`;
}

/**
 * The user's paper collection: one pretty-printed JSON file per paper.
 *
 * `get`, `listAll` and `search` treat unreadable files as absent; use
 * `diagnose` to find out which files were skipped.
 */
export class PaperStore {
    readonly dataDir: string;

    constructor(dataDir: string) {
        this.dataDir = dataDir;
        mkdirSync(this.dataDir, { recursive: true });
    }

    /**
     * Add a paper to the collection. Only the record fields are written.
     * @throws RecordValidationError if the paper does not match the record schema
     * @throws AlreadyExistsError if a paper with the same id is stored
     */
    create(paper: PaperRecord): void {
        const record = validateRecord(paper);
        const filePath = this.pathFor(record.id);
        if (existsSync(filePath)) {
            throw new AlreadyExistsError(record.id);
        }
        writeJsonFile(filePath, record);
    }

    /**
     * Get a paper by id, or null when it is missing or unreadable.
     */
    get(paperId: string): PaperRecord | null {
        const filePath = this.pathFor(paperId);
        if (!existsSync(filePath)) return null;

        const result = readJsonFile(filePath, PaperRecordSchema);
        // Distinct ids can share a file name ("arxiv:X" and "arxiv_X")
        return result.ok && result.value.id === paperId ? result.value : null;
    }

    /**
     * Replace a stored paper wholesale. The id selects the file, so it cannot change.
     * @throws RecordValidationError if the paper does not match the record schema
     * @throws NotFoundError if no paper with this id is stored
     */
    update(paper: PaperRecord): void {
        const record = validateRecord(paper);
        if (!this.get(record.id)) {
            throw new NotFoundError('paper', record.id);
        }
        writeJsonFile(this.pathFor(record.id), record);
    }

    /**
     * @throws NotFoundError if no paper with this id is stored
     */
    delete(paperId: string): void {
        if (!this.get(paperId)) {
            throw new NotFoundError('paper', paperId);
        }
        unlinkSync(this.pathFor(paperId));
    }

    /**
     * Every readable paper, in directory enumeration order.
     */
    listAll(): PaperRecord[] {
        const papers: PaperRecord[] = [];
        for (const file of this.recordFiles()) {
            const result = readJsonFile(join(this.dataDir, file), PaperRecordSchema);
            if (result.ok) papers.push(result.value);
        }
        return papers;
    }

    /**
     * Case-insensitive substring search over the title and the
     * problem, method and key results of each paper's insights.
     */
    search(query: string): PaperRecord[] {
        const needle = query.toLowerCase();

        return this.listAll().filter((paper) => {
            if (paper.title.toLowerCase().includes(needle)) return true;

            const { problem, method, key_results } = paper.insights;
            return (problem + method + key_results).toLowerCase().includes(needle);
        });
    }

    /**
     * Record files that `listAll` skips, with the reason each failed to load.
     */
    diagnose(): UnreadableRecord[] {
        const unreadable: UnreadableRecord[] = [];
        for (const file of this.recordFiles()) {
            const result = readJsonFile(join(this.dataDir, file), PaperRecordSchema);
            if (!result.ok) unreadable.push({ file, reason: result.reason });
        }
        return unreadable;
    }

    private recordFiles(): string[] {
        return readdirSync(this.dataDir).filter((file) => file.endsWith('.json') && !file.startsWith('.'));
    }

    private pathFor(paperId: string): string {
        return join(this.dataDir, paperFileName(paperId));
    }
}

function validateRecord(paper: PaperRecord): PaperRecord {
    const result = PaperRecordSchema.safeParse(paper);
    if (!result.success) {
        throw new RecordValidationError(result.error.issues, { cause: result.error });
    }
    return result.data;
}
