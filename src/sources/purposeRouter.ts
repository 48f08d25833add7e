/**
 * Sends each task to the fetcher that serves its purpose: result pages to
 * the SERP fetcher (browser or HTTP), suggestion lists to the HTTP fetcher.
 * Each delegate reports to the proxy pool itself, so the router never does.
 */

import type { FetchResponse, FetchTask, ProxyChoice, TaskPurpose } from '../engine/types.js';
import type { Fetcher } from './types.js';

export class PurposeRouter implements Fetcher {
    constructor(private readonly routes: Record<TaskPurpose, Fetcher>) {}

    fetch(task: FetchTask, proxy: ProxyChoice): Promise<FetchResponse> {
        return this.routes[task.purpose].fetch(task, proxy);
    }

    async close(): Promise<void> {
        const unique = new Set(Object.values(this.routes));
        await Promise.all([...unique].map((f) => f.close()));
    }
}
