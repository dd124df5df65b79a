import type { ProfileBackend, ProfileBackendName, ProfileFailureReason, ProfileResult } from '../types/index.js';
import type { ProfileCache } from '../cache/profile-cache.js';
import { getHttpClient, HttpError, type HttpClient } from '../utils/http-client.js';
import { getLogger, type Logger } from '../utils/logger.js';
import { randomDelay, sleep as realSleep, type RandomFn, type SleepFn } from '../utils/sleep.js';

/**
 * Phrases that identify an anti-bot interstitial instead of a profile.
 */
const BLOCK_MARKERS = ['unusual traffic', 'captcha', 'not a robot'];

/**
 * True when a response body looks like an anti-bot page.
 */
export function isBlockedResponse(text: string): boolean {
    const lower = text.toLowerCase();
    return BLOCK_MARKERS.some((marker) => lower.includes(marker));
}

function failureReason(error: HttpError): ProfileFailureReason {
    if (error.aborted || error.status === 429) return 'blocked';
    if (error.status === 404) return 'not_found';
    return 'transport';
}

export interface ProfileBackendOptions {
    httpClient?: HttpClient;
    /** Lower bound of the random wait before each call */
    delayMinMs?: number;
    /** Upper bound of the random wait before each call */
    delayMaxMs?: number;
    cache?: ProfileCache;
    sleep?: SleepFn;
    random?: RandomFn;
    logger?: Logger;
    now?: () => Date;
}

/**
 * Shared behaviour of the per-identifier profile backends: randomized
 * politeness delay, cache lookup and mapping of HTTP failures to a
 * failure result. Variants implement `fetchUncached`.
 */
export abstract class BaseProfileBackend implements ProfileBackend {
    abstract readonly name: ProfileBackendName;

    protected readonly httpClient: HttpClient;
    protected readonly logger: Logger;
    protected readonly now: () => Date;
    private readonly delayMinMs: number;
    private readonly delayMaxMs: number;
    private readonly cache?: ProfileCache;
    private readonly sleep: SleepFn;
    private readonly random: RandomFn;

    constructor(options: ProfileBackendOptions = {}) {
        this.httpClient = options.httpClient ?? getHttpClient();
        this.logger = options.logger ?? getLogger();
        this.now = options.now ?? (() => new Date());
        this.delayMinMs = options.delayMinMs ?? 3000;
        this.delayMaxMs = options.delayMaxMs ?? 7000;
        this.cache = options.cache;
        this.sleep = options.sleep ?? realSleep;
        this.random = options.random ?? Math.random;
    }

    async fetchProfile(id: string): Promise<ProfileResult> {
        const profileId = id.trim();
        if (!profileId) {
            return { ok: false, reason: 'not_found', message: 'Empty profile id' };
        }

        const cached = this.cache?.get(this.name, profileId);
        if (cached) return { ok: true, record: cached };

        await this.sleep(randomDelay(this.delayMinMs, this.delayMaxMs, this.random));

        let result: ProfileResult;
        try {
            result = await this.fetchUncached(profileId);
        } catch (error) {
            if (!(error instanceof HttpError)) throw error;
            result = { ok: false, reason: failureReason(error), message: error.message };
        }

        if (result.ok) {
            this.cache?.set(this.name, profileId, result.record);
            this.logger.debug({ backend: this.name, id: profileId, name: result.record.name }, 'Profile fetched');
        } else {
            this.logger.warn({ backend: this.name, id: profileId, reason: result.reason }, result.message);
        }

        return result;
    }

    /**
     * Fetch and parse one profile. HttpError rejections are mapped to failure results by the caller.
     */
    protected abstract fetchUncached(id: string): Promise<ProfileResult>;
}
