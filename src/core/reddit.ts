import type { z } from "zod";
import {
  commentListingSchema,
  submissionListingSchema,
  tokenResponseSchema,
  userAboutSchema,
  type ListingPage,
  type RedditComment,
  type RedditSubmission,
} from "../types/reddit.js";
import type { RedditConfig } from "../utils/config.js";
import { fetchWithTrace, readErrorBody } from "../utils/fetchWithTrace.js";
import type { Logger } from "../utils/logger.js";
import { ExternalAPIError, UserNotFoundError } from "./errors.js";

const TOKEN_URL = "https://www.reddit.com/api/v1/access_token";
const API_BASE = "https://oauth.reddit.com";

export const MAX_PAGE_SIZE = 100;

export interface ListingRequest {
  limit: number;
  after?: string | null;
}

/**
 * Read-only Reddit client using application-only OAuth ("script" app
 * credentials). One token is fetched lazily and reused for the whole run.
 */
export class RedditClient {
  private accessToken: string | null = null;

  constructor(
    private readonly config: RedditConfig,
    private readonly logger: Logger
  ) {}

  private async authenticate(): Promise<string> {
    if (this.accessToken) return this.accessToken;

    const credentials = Buffer.from(`${this.config.clientId}:${this.config.clientSecret}`).toString("base64");
    const response = await this.send(TOKEN_URL, {
      method: "POST",
      headers: {
        Authorization: `Basic ${credentials}`,
        "Content-Type": "application/x-www-form-urlencoded",
        "User-Agent": this.config.userAgent,
      },
      body: new URLSearchParams({ grant_type: "client_credentials" }).toString(),
    });

    if (!response.ok) {
      throw new ExternalAPIError("reddit", `authentication failed: ${await readErrorBody(response)}`, response.status);
    }

    const token = await this.parse(response, tokenResponseSchema);
    this.accessToken = token.access_token;
    this.logger.debug("reddit", "Obtained application access token");
    return token.access_token;
  }

  private async send(url: string, init: RequestInit): Promise<Response> {
    try {
      return await fetchWithTrace(this.logger, "reddit", url, init);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      throw new ExternalAPIError("reddit", message, undefined, { cause: error });
    }
  }

  private async parse<T extends z.ZodTypeAny>(response: Response, schema: T): Promise<z.infer<T>> {
    let body: unknown;
    try {
      body = await response.json();
    } catch (error) {
      throw new ExternalAPIError("reddit", "response is not valid JSON", response.status, { cause: error });
    }

    const result = schema.safeParse(body);
    if (!result.success) {
      throw new ExternalAPIError("reddit", `unexpected response shape: ${result.error.message}`, response.status, {
        cause: result.error,
      });
    }
    return result.data;
  }

  private async get<T extends z.ZodTypeAny>(
    username: string,
    path: string,
    schema: T,
    params: Record<string, string> = {}
  ): Promise<z.infer<T>> {
    const token = await this.authenticate();
    const query = new URLSearchParams({ ...params, raw_json: "1" });
    const url = `${API_BASE}/user/${encodeURIComponent(username)}/${path}?${query.toString()}`;

    const response = await this.send(url, {
      headers: {
        Authorization: `Bearer ${token}`,
        "User-Agent": this.config.userAgent,
      },
    });

    if (response.status === 404) {
      throw new UserNotFoundError(username);
    }
    if (response.status === 403) {
      throw new UserNotFoundError(username, "is suspended or private");
    }
    if (!response.ok) {
      throw new ExternalAPIError("reddit", await readErrorBody(response), response.status);
    }
    return this.parse(response, schema);
  }

  /** Throws `UserNotFoundError` for unknown, suspended or private accounts. */
  async ensureUserExists(username: string): Promise<void> {
    const about = await this.get(username, "about", userAboutSchema);
    if (about.data.is_suspended) {
      throw new UserNotFoundError(username, "is suspended");
    }
  }

  async getSubmissions(username: string, request: ListingRequest): Promise<ListingPage<RedditSubmission>> {
    const listing = await this.get(username, "submitted", submissionListingSchema, listingParams(request));
    return {
      items: listing.data.children.map((child) => child.data),
      after: listing.data.after,
    };
  }

  async getComments(username: string, request: ListingRequest): Promise<ListingPage<RedditComment>> {
    const listing = await this.get(username, "comments", commentListingSchema, listingParams(request));
    return {
      items: listing.data.children.map((child) => child.data),
      after: listing.data.after,
    };
  }
}

function listingParams({ limit, after }: ListingRequest): Record<string, string> {
  const params: Record<string, string> = {
    sort: "new",
    limit: String(Math.min(Math.max(limit, 1), MAX_PAGE_SIZE)),
  };
  if (after) {
    params.after = after;
  }
  return params;
}
