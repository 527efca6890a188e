import { InsightsSchema, type Insights } from '../types/index.js';
import { InsightParseError, InsightValidationError } from '../utils/errors.js';

const FENCE = '```';
const JSON_FENCE = '```json';

/**
 * A way of locating the JSON payload inside a model response.
 * Returns null when the strategy does not apply to the response.
 */
interface PayloadStrategy {
    name: 'json-fence' | 'bare-fence' | 'raw';
    extract(response: string): string | null;
}

/**
 * Text between `openIndex + openLength` and the next closing fence.
 * An unclosed fence runs to the end of the response.
 */
function sliceFenced(response: string, openIndex: number, openLength: number): string {
    const start = openIndex + openLength;
    const end = response.indexOf(FENCE, start);
    return response.slice(start, end === -1 ? undefined : end);
}

/**
 * Drop a language tag such as `JSON` or `javascript` left on the opening fence line.
 */
function stripInfoString(block: string): string {
    const newline = block.indexOf('\n');
    if (newline === -1) return block;
    return /^[\w-]+\s*$/.test(block.slice(0, newline)) ? block.slice(newline + 1) : block;
}

/** Tried in order; first match wins. */
export const PAYLOAD_STRATEGIES: readonly PayloadStrategy[] = [
    {
        name: 'json-fence',
        extract(response) {
            const open = response.indexOf(JSON_FENCE);
            if (open === -1) return null;
            return sliceFenced(response, open, JSON_FENCE.length).trim();
        },
    },
    {
        name: 'bare-fence',
        extract(response) {
            const open = response.indexOf(FENCE);
            if (open === -1) return null;
            return stripInfoString(sliceFenced(response, open, FENCE.length)).trim();
        },
    },
    {
        name: 'raw',
        extract(response) {
            return response.trim();
        },
    },
];

/**
 * Locate the JSON payload in a model response.
 */
export function extractJsonPayload(response: string): string {
    for (const strategy of PAYLOAD_STRATEGIES) {
        const payload = strategy.extract(response);
        if (payload !== null) return payload;
    }
    return response.trim();
}

/**
 * Parse a model response into validated insights. All-or-nothing: any
 * malformed JSON or shape mismatch throws, never a partial value.
 */
export function parseInsightsResponse(response: string): Insights {
    const payload = extractJsonPayload(response);

    let data: unknown;
    try {
        data = JSON.parse(payload);
    } catch (error) {
        const reason = error instanceof Error ? error.message : String(error);
        throw new InsightParseError(`Failed to parse response: ${reason}`, { cause: error });
    }

    const result = InsightsSchema.safeParse(data);
    if (!result.success) {
        throw new InsightValidationError(result.error.issues, { cause: result.error });
    }
    return result.data;
}
