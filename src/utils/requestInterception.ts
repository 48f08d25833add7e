type MinimalRoute = {
    request(): {
        url(): string;
        resourceType(): string;
    };
    abort(): unknown;
    continue(): unknown;
};

export type InterceptablePage = {
    route(
        url: string,
        handler: (route: MinimalRoute) => unknown
    ): Promise<unknown> | unknown;
};

const ALWAYS_BLOCK_PATTERNS = [
    'google-analytics',
    'googletagmanager',
    'doubleclick',
    'googlesyndication',
    'googleadservices',
    'facebook.net',
    'hotjar',
    'bat.bing.com',
];

/** Nothing the SERP extractor reads lives in these. */
const HEAVY_RESOURCE_TYPES = new Set(['image', 'stylesheet', 'font', 'media']);

const routedPages = new WeakSet<object>();

export function shouldBlockRequest(
    requestUrl: string,
    resourceType: string,
    blockHeavyResources: boolean
): boolean {
    if (ALWAYS_BLOCK_PATTERNS.some((pattern) => requestUrl.includes(pattern))) {
        return true;
    }

    return blockHeavyResources && HEAVY_RESOURCE_TYPES.has(resourceType);
}

/** Installs the blocking route once per page; returns false if already installed. */
export async function ensureRequestInterception(
    page: InterceptablePage,
    blockHeavyResources: boolean
): Promise<boolean> {
    if (routedPages.has(page)) {
        return false;
    }

    routedPages.add(page);

    try {
        await page.route('**/*', (route: MinimalRoute) => {
            const request = route.request();
            if (shouldBlockRequest(request.url(), request.resourceType(), blockHeavyResources)) {
                return route.abort();
            }
            return route.continue();
        });

        return true;
    } catch (err) {
        routedPages.delete(page);
        throw err;
    }
}
