/**
 * src/sources/blockDetection.ts
 *
 * Decides whether a response is a challenge / CAPTCHA / rate-limit page
 * rather than real content. Search engines routinely answer bots with
 * HTTP 200 and a challenge body, so the status code alone is not enough.
 *
 * The predicate is a plain function so callers can swap in their own.
 */

export interface InspectedResponse {
    body: string;
    statusCode: number;
    finalUrl: string;
}

/** Returns a human-readable reason when the response is a block page, else null. */
export type BlockDetector = (response: InspectedResponse) => string | null;

/**
 * Lowercase fragments found on challenge pages. Matched against the first
 * BODY_SCAN_LIMIT characters of the body.
 */
export const BLOCK_PAGE_PATTERNS: readonly string[] = [
    'our systems have detected unusual traffic',
    'unusual traffic from your computer network',
    'id="captcha-form"',
    'g-recaptcha',
    'recaptcha/api.js',
    'please show you\'re not a robot',
    'are you a robot',
    'let us know you\'re human',
    'too many requests',
    'rate limit exceeded',
];

/** 429 / 403 / 503 are what bot-detection front ends answer with. */
export const BLOCK_STATUS_CODES: ReadonlySet<number> = new Set([429, 403, 503]);

const BODY_SCAN_LIMIT = 20_000;

/**
 * Status code and challenge redirect only. Used for JSON endpoints, where a
 * body scan would trip over suggestions that merely mention "captcha".
 */
export const detectBlockStatus: BlockDetector = (response) => {
    if (BLOCK_STATUS_CODES.has(response.statusCode)) {
        return `status ${response.statusCode}`;
    }
    if (/\/sorry\/(index|image)/.test(response.finalUrl)) {
        return 'redirected to challenge page';
    }
    return null;
};

export const detectBlockPage: BlockDetector = (response) => {
    const statusReason = detectBlockStatus(response);
    if (statusReason) return statusReason;

    const head = response.body.slice(0, BODY_SCAN_LIMIT).toLowerCase();
    for (const pattern of BLOCK_PAGE_PATTERNS) {
        if (head.includes(pattern)) return `challenge marker "${pattern}"`;
    }

    return null;
};

/** Builds a detector that also matches caller-supplied markers. */
export function withExtraMarkers(markers: readonly string[], base: BlockDetector = detectBlockPage): BlockDetector {
    const lowered = markers.map((m) => m.toLowerCase()).filter(Boolean);
    return (response) => {
        const baseReason = base(response);
        if (baseReason) return baseReason;
        const head = response.body.slice(0, BODY_SCAN_LIMIT).toLowerCase();
        const hit = lowered.find((m) => head.includes(m));
        return hit ? `challenge marker "${hit}"` : null;
    };
}
