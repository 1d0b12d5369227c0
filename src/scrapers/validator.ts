import { z } from 'zod';
import { config } from '../config.js';
import { logger } from '../core/logger.js';
import { RequestPacer, sleep, type Sleeper } from '../core/rateLimit.js';
import { communityName } from './posts.js';
import type { FetchLike } from './retriever.js';

export const TOKEN_URL = 'https://www.reddit.com/api/v1/access_token';
export const OAUTH_BASE = 'https://oauth.reddit.com';

const tokenSchema = z.object({
  access_token: z.string().min(1),
});

const aboutSchema = z.object({
  data: z.object({
    display_name: z.string(),
    over18: z.boolean().nullish(),
    subscribers: z.number().nullish(),
  }),
});

export interface ValidatorOptions {
  clientId?: string;
  clientSecret?: string;
  userAgent: string;
  minSubscribers: number;
  /** Pause between community lookups. */
  intervalMs?: number;
  sleeper?: Sleeper;
  fetchImpl?: FetchLike;
}

export function validatorOptionsFromConfig(): ValidatorOptions {
  return {
    clientId: config.reddit.clientId,
    clientSecret: config.reddit.clientSecret,
    userAgent: config.reddit.userAgent,
    minSubscribers: config.reddit.minSubscribers,
  };
}

/**
 * Checks candidate communities against Reddit's own metadata using an
 * application-only token. Returns null whenever validation cannot run, so
 * callers fall back to heuristic cleaning.
 */
export class CommunityValidator {
  private readonly fetchImpl: FetchLike;
  private readonly pacer: RequestPacer;

  constructor(private readonly options: ValidatorOptions = validatorOptionsFromConfig()) {
    this.fetchImpl = options.fetchImpl ?? ((input, init) => fetch(input, init));
    this.pacer = new RequestPacer(options.intervalMs ?? 200, options.sleeper ?? sleep);
  }

  get enabled(): boolean {
    return Boolean(this.options.clientId && this.options.clientSecret);
  }

  async validate(candidates: string[], limit: number, signal?: AbortSignal): Promise<string[] | null> {
    if (!this.enabled) {
      logger.info('Community validation skipped: no Reddit credentials configured');
      return null;
    }

    let token: string;
    try {
      token = await this.fetchToken(signal);
    } catch (error) {
      logger.warn(`Community validation skipped: ${error instanceof Error ? error.message : String(error)}`);
      return null;
    }

    const good: string[] = [];
    for (const candidate of candidates.slice(0, limit)) {
      if (signal?.aborted) break;
      const name = communityName(candidate);
      if (!name) continue;

      await this.pacer.wait(signal);
      try {
        const about = await this.fetchAbout(name, token, signal);
        if (about.over18) {
          logger.debug(`Validation: r/${name} is NSFW, dropped`);
          continue;
        }
        const subscribers = about.subscribers ?? 0;
        if (subscribers < this.options.minSubscribers) {
          logger.debug(`Validation: r/${name} has ${subscribers} subscribers, dropped`);
          continue;
        }
        good.push(`r/${about.display_name}`);
      } catch (error) {
        logger.debug(`Validation: r/${name} lookup failed: ${error instanceof Error ? error.message : String(error)}`);
      }
    }

    if (good.length === 0) {
      logger.warn('Community validation kept nothing; falling back to heuristic cleaning');
      return null;
    }
    logger.info(`Validated communities: ${good.join(' ')}`);
    return good;
  }

  private async fetchToken(signal?: AbortSignal): Promise<string> {
    const credentials = Buffer.from(`${this.options.clientId ?? ''}:${this.options.clientSecret ?? ''}`).toString('base64');
    const response = await this.fetchImpl(TOKEN_URL, {
      method: 'POST',
      headers: {
        'Authorization': `Basic ${credentials}`,
        'Content-Type': 'application/x-www-form-urlencoded',
        'User-Agent': this.options.userAgent,
      },
      body: 'grant_type=client_credentials',
      signal,
    });
    if (!response.ok) {
      throw new Error(`token request failed with HTTP ${response.status}`);
    }
    const parsed = tokenSchema.safeParse(await response.json());
    if (!parsed.success) {
      throw new Error('token response has no access_token');
    }
    return parsed.data.access_token;
  }

  private async fetchAbout(name: string, token: string, signal?: AbortSignal): Promise<z.infer<typeof aboutSchema>['data']> {
    const response = await this.fetchImpl(`${OAUTH_BASE}/r/${encodeURIComponent(name)}/about`, {
      headers: {
        'Authorization': `Bearer ${token}`,
        'User-Agent': this.options.userAgent,
      },
      signal,
    });
    if (!response.ok) {
      throw new Error(`HTTP ${response.status}`);
    }
    const parsed = aboutSchema.safeParse(await response.json());
    if (!parsed.success) {
      throw new Error('unexpected about payload');
    }
    return parsed.data.data;
  }
}
