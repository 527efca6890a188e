import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { PaperStore, paperFileName } from '../storage/paper-store.js';
import { AlreadyExistsError, NotFoundError, RecordValidationError } from '../utils/errors.js';
import { makeCandidate, makeInsights, makePaper } from './fixtures.js';

describe('PaperStore', () => {
    let tmpDir: string;
    let dataDir: string;
    let store: PaperStore;

    beforeEach(() => {
        tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'paper-reader-store-'));
        dataDir = path.join(tmpDir, 'papers');
        store = new PaperStore(dataDir);
    });

    afterEach(() => {
        fs.rmSync(tmpDir, { recursive: true, force: true });
    });

    describe('paperFileName', () => {
        it('should replace colons', () => {
            expect(paperFileName('arxiv:2301.12345')).toBe('arxiv_2301.12345.json');
        });

        it('should replace slashes', () => {
            expect(paperFileName('arxiv:hep-th/9901001')).toBe('arxiv_hep-th_9901001.json');
        });
    });

    describe('initialization', () => {
        it('should create the data directory', () => {
            expect(fs.existsSync(dataDir)).toBe(true);
        });
    });

    describe('create', () => {
        it('should round-trip a paper', () => {
            const paper = makePaper();
            store.create(paper);

            expect(store.get(paper.id)).toEqual(paper);
        });

        it('should round-trip a paper with a pdf path and notes', () => {
            const paper = makePaper({ pdf_path: '/tmp/pdfs/2301.12345.pdf', notes: 'Read section 3', status: 'reading' });
            store.create(paper);

            expect(store.get(paper.id)).toEqual(paper);
        });

        it('should write pretty-printed snake_case JSON', () => {
            store.create(makePaper());

            const raw = fs.readFileSync(path.join(dataDir, 'arxiv_2301.12345.json'), 'utf-8');
            expect(raw.startsWith('{\n  "id": "arxiv:2301.12345",\n')).toBe(true);

            const data = JSON.parse(raw);
            expect(data.pdf_path).toBeNull();
            expect(data.added_date).toBe('2025-10-31T09:00:00.000Z');
            expect(data.insights.key_results).toBe('Test results');
        });

        it('should leave no temporary files behind', () => {
            store.create(makePaper());
            expect(fs.readdirSync(dataDir)).toEqual(['arxiv_2301.12345.json']);
        });

        it('should reject a duplicate id and keep the stored record', () => {
            const paper = makePaper();
            store.create(paper);

            expect(() => store.create({ ...paper, title: 'Changed' })).toThrow(AlreadyExistsError);
            expect(store.get(paper.id)?.title).toBe('Test Paper');
        });

        it('should name the duplicate id in the error', () => {
            store.create(makePaper());
            expect(() => store.create(makePaper())).toThrow('Paper arxiv:2301.12345 already exists');
        });

        it('should write only the record fields', () => {
            const paper = makePaper();
            store.create({ ...makeCandidate(), ...paper });

            const data = JSON.parse(fs.readFileSync(path.join(dataDir, 'arxiv_2301.12345.json'), 'utf-8'));
            expect(Object.keys(data)).toEqual(Object.keys(paper));
            expect(store.get(paper.id)).toEqual(paper);
        });

        it('should reject an empty id and write nothing', () => {
            expect(() => store.create(makePaper({ id: '' }))).toThrow(RecordValidationError);
            expect(() => store.create(makePaper({ id: '' }))).toThrow('Invalid paper record: id: ');
            expect(fs.readdirSync(dataDir)).toEqual([]);
        });
    });

    describe('get', () => {
        it('should return null for a missing paper', () => {
            expect(store.get('nonexistent')).toBeNull();
        });

        it('should not return a record stored under a colliding id', () => {
            store.create(makePaper({ id: 'arxiv_2301.12345' }));

            expect(store.get('arxiv:2301.12345')).toBeNull();
            expect(store.get('arxiv_2301.12345')?.id).toBe('arxiv_2301.12345');
        });

        it('should return null for a corrupt file', () => {
            fs.writeFileSync(path.join(dataDir, 'arxiv_2301.12345.json'), '{"id": "arxiv:2301.1', 'utf-8');
            expect(store.get('arxiv:2301.12345')).toBeNull();
        });

        it('should default missing notes to an empty string', () => {
            const { notes: _notes, ...withoutNotes } = makePaper();
            fs.writeFileSync(path.join(dataDir, 'arxiv_2301.12345.json'), JSON.stringify(withoutNotes), 'utf-8');

            expect(store.get('arxiv:2301.12345')?.notes).toBe('');
        });
    });

    describe('update', () => {
        it('should overwrite status and notes', () => {
            const paper = makePaper();
            store.create(paper);

            store.update({ ...paper, status: 'read', notes: 'Finished reading' });

            const retrieved = store.get(paper.id);
            expect(retrieved?.status).toBe('read');
            expect(retrieved?.notes).toBe('Finished reading');
        });

        it('should replace the record wholesale', () => {
            const paper = makePaper();
            store.create(paper);

            const replacement = makePaper({ title: 'Renamed', authors: [], interests: [] });
            store.update(replacement);

            expect(store.get(paper.id)).toEqual(replacement);
        });

        it('should throw NotFoundError and create nothing when the paper is absent', () => {
            expect(() => store.update(makePaper())).toThrow(NotFoundError);
            expect(fs.readdirSync(dataDir)).toEqual([]);
        });

        it('should not overwrite a record whose id only shares its file name', () => {
            const paper = makePaper();
            store.create(paper);

            expect(() => store.update(makePaper({ id: 'arxiv_2301.12345', title: 'Other' }))).toThrow(NotFoundError);
            expect(store.get(paper.id)).toEqual(paper);
        });

        it('should drop extra fields and reject invalid records', () => {
            const paper = makePaper();
            store.create(paper);

            store.update({ ...makeCandidate({ id: paper.id }), ...paper, status: 'read' });
            const data = JSON.parse(fs.readFileSync(path.join(dataDir, 'arxiv_2301.12345.json'), 'utf-8'));
            expect(data).not.toHaveProperty('arxiv_categories');

            expect(() => store.update(makePaper({ id: '' }))).toThrow(RecordValidationError);
            expect(store.get(paper.id)?.status).toBe('read');
        });
    });

    describe('delete', () => {
        it('should remove the paper', () => {
            const paper = makePaper();
            store.create(paper);
            store.delete(paper.id);

            expect(store.get(paper.id)).toBeNull();
            expect(fs.readdirSync(dataDir)).toEqual([]);
        });

        it('should throw NotFoundError when the paper is absent', () => {
            expect(() => store.delete('nonexistent')).toThrow('Paper nonexistent not found');
        });
    });

    describe('listAll', () => {
        it('should return an empty list for an empty collection', () => {
            expect(store.listAll()).toEqual([]);
        });

        it('should return every stored paper', () => {
            store.create(makePaper());
            store.create(makePaper({
                id: 'arxiv:2301.67890',
                title: 'Second Paper',
                insights: makeInsights({ classification: 'incremental' }),
            }));

            const ids = store.listAll().map((paper) => paper.id);
            expect(ids).toHaveLength(2);
            expect(new Set(ids)).toEqual(new Set(['arxiv:2301.12345', 'arxiv:2301.67890']));
        });

        it('should skip unreadable files and non-JSON files', () => {
            store.create(makePaper());
            fs.writeFileSync(path.join(dataDir, 'broken.json'), 'not json', 'utf-8');
            fs.writeFileSync(path.join(dataDir, 'README.txt'), 'hello', 'utf-8');

            expect(store.listAll().map((paper) => paper.id)).toEqual(['arxiv:2301.12345']);
        });
    });

    describe('search', () => {
        beforeEach(() => {
            store.create(makePaper({
                title: 'Sparse Attention Mechanisms',
                insights: makeInsights({ method: 'uses sparse attention patterns' }),
            }));
        });

        it('should match the title', () => {
            expect(store.search('Sparse Attention').map((p) => p.id)).toEqual(['arxiv:2301.12345']);
        });

        it('should match the insights', () => {
            expect(store.search('sparse attention patterns').map((p) => p.id)).toEqual(['arxiv:2301.12345']);
        });

        it('should be case-insensitive', () => {
            expect(store.search('SPARSE').map((p) => p.id)).toEqual(['arxiv:2301.12345']);
        });

        it('should match across the concatenated problem, method and key results', () => {
            // problem "Test problem" + method "uses sparse..." → "Test problemuses sparse..."
            expect(store.search('problemuses').map((p) => p.id)).toEqual(['arxiv:2301.12345']);
        });

        it('should not search contributions or notes', () => {
            store.update(makePaper({
                title: 'Sparse Attention Mechanisms',
                insights: makeInsights({ method: 'uses sparse attention patterns', contributions: ['Unique contribution'] }),
                notes: 'unique note',
            }));
            expect(store.search('Unique')).toEqual([]);
        });

        it('should return nothing for an unknown term', () => {
            expect(store.search('nonexistent term')).toEqual([]);
        });
    });

    describe('diagnose', () => {
        it('should report nothing for a healthy collection', () => {
            store.create(makePaper());
            expect(store.diagnose()).toEqual([]);
        });

        it('should report malformed JSON', () => {
            fs.writeFileSync(path.join(dataDir, 'arxiv_2301.99999.json'), '{"id":', 'utf-8');

            const report = store.diagnose();
            expect(report).toHaveLength(1);
            expect(report[0]?.file).toBe('arxiv_2301.99999.json');
            expect(report[0]?.reason).toMatch(/^Invalid JSON: /);
        });

        it('should report records that do not match the schema', () => {
            const { insights: _insights, ...withoutInsights } = makePaper();
            fs.writeFileSync(path.join(dataDir, 'arxiv_2301.12345.json'), JSON.stringify(withoutInsights), 'utf-8');

            expect(store.diagnose()).toEqual([{ file: 'arxiv_2301.12345.json', reason: 'insights: Required' }]);
        });
    });
});
