import type { ZodIssue } from 'zod';

/**
 * Insight or text extraction failed. Wraps the underlying cause so callers
 * never see provider- or parser-specific error shapes.
 */
export class ExtractionError extends Error {
    constructor(message: string, options?: { cause?: unknown }) {
        super(message, options);
        this.name = 'ExtractionError';
    }
}

/**
 * The model responded, but the response did not contain a decodable JSON object.
 */
export class InsightParseError extends ExtractionError {
    constructor(message: string, options?: { cause?: unknown }) {
        super(message, options);
        this.name = 'InsightParseError';
    }
}

/**
 * The response decoded as JSON but did not match the insights shape.
 */
export class InsightValidationError extends InsightParseError {
    constructor(public readonly issues: ZodIssue[], options?: { cause?: unknown }) {
        super(`Invalid insights: ${formatIssues(issues)}`, options);
        this.name = 'InsightValidationError';
    }
}

export class AlreadyExistsError extends Error {
    constructor(public readonly id: string) {
        super(`Paper ${id} already exists`);
        this.name = 'AlreadyExistsError';
    }
}

/**
 * A paper record did not match the record schema and was not written.
 */
export class RecordValidationError extends Error {
    constructor(public readonly issues: ZodIssue[], options?: { cause?: unknown }) {
        super(`Invalid paper record: ${formatIssues(issues)}`, options);
        this.name = 'RecordValidationError';
    }
}

export class NotFoundError extends Error {
    constructor(
        public readonly resource: 'paper' | 'pdf',
        public readonly key: string
    ) {
        super(resource === 'paper' ? `Paper ${key} not found` : `PDF not found: ${key}`);
        this.name = 'NotFoundError';
    }
}

function formatIssues(issues: ZodIssue[]): string {
    return issues
        .map((issue) => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
        .join('; ');
}
