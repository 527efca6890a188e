import { existsSync, mkdirSync } from 'node:fs';
import { join } from 'node:path';
import { ResearchInterestsSchema, type InterestKind, type ResearchInterests } from '../types/index.js';
import { readJsonFile, writeJsonFile } from './json-file.js';

export const INTERESTS_FILE = 'interests.json';

function emptyInterests(): ResearchInterests {
    return { areas: [], topics: [], arxiv_categories: [] };
}

/**
 * Research interests stored in `<dataDir>/interests.json`.
 */
export class InterestStore {
    readonly filePath: string;

    constructor(dataDir: string) {
        mkdirSync(dataDir, { recursive: true });
        this.filePath = join(dataDir, INTERESTS_FILE);
    }

    /**
     * Load interests, or null when none are saved or the file is unreadable.
     */
    load(): ResearchInterests | null {
        if (!existsSync(this.filePath)) return null;

        const result = readJsonFile(this.filePath, ResearchInterestsSchema);
        return result.ok ? result.value : null;
    }

    save(interests: ResearchInterests): void {
        writeJsonFile(this.filePath, interests);
    }

    /**
     * Append a value to one of the interest lists unless it is already there.
     * @returns whether the list changed
     */
    add(kind: InterestKind, value: string): boolean {
        const interests = this.load() ?? emptyInterests();
        if (interests[kind].includes(value)) return false;

        interests[kind].push(value);
        this.save(interests);
        return true;
    }

    /**
     * Remove a value from one of the interest lists.
     * @returns whether the list changed
     */
    remove(kind: InterestKind, value: string): boolean {
        const interests = this.load();
        if (!interests || !interests[kind].includes(value)) return false;

        interests[kind] = interests[kind].filter((item) => item !== value);
        this.save(interests);
        return true;
    }
}
