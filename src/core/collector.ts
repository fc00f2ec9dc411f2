import type { ActivityItem } from "../types/persona.js";
import type { ListingPage, RedditComment, RedditSubmission } from "../types/reddit.js";
import type { Logger } from "../utils/logger.js";
import type { ListingRequest, RedditClient } from "./reddit.js";

const REDDIT_WEB = "https://reddit.com";

export function submissionToActivity(post: RedditSubmission): ActivityItem | null {
  const title = post.title.trim();
  const body = post.selftext.trim();
  const text = body ? `${title}\n\n${body}` : title;
  if (!text) return null;

  const item: ActivityItem = {
    kind: "submission",
    text,
    created_at: new Date(post.created_utc * 1000),
    permalink: `${REDDIT_WEB}${post.permalink}`,
    subreddit: post.subreddit,
  };
  return Object.freeze(item);
}

export function commentToActivity(comment: RedditComment): ActivityItem | null {
  const text = comment.body.trim();
  if (!text) return null;

  const item: ActivityItem = {
    kind: "comment",
    text,
    created_at: new Date(comment.created_utc * 1000),
    permalink: `${REDDIT_WEB}${comment.permalink}`,
    subreddit: comment.subreddit,
  };
  return Object.freeze(item);
}

/**
 * Merges two newest-first sequences into one newest-first sequence of at most
 * `limit` items. On equal timestamps the item from `first` comes first.
 */
export function mergeByRecency(
  first: readonly ActivityItem[],
  second: readonly ActivityItem[],
  limit: number
): ActivityItem[] {
  const merged: ActivityItem[] = [];
  let i = 0;
  let j = 0;

  while (merged.length < limit && (i < first.length || j < second.length)) {
    if (j >= second.length) {
      merged.push(first[i++]);
    } else if (i >= first.length) {
      merged.push(second[j++]);
    } else if (first[i].created_at.getTime() >= second[j].created_at.getTime()) {
      merged.push(first[i++]);
    } else {
      merged.push(second[j++]);
    }
  }
  return merged;
}

export class Collector {
  constructor(
    private readonly client: RedditClient,
    private readonly logger: Logger
  ) {}

  private async paginate<T>(
    label: string,
    fetchPage: (request: ListingRequest) => Promise<ListingPage<T>>,
    convert: (raw: T) => ActivityItem | null,
    maxItems: number
  ): Promise<ActivityItem[]> {
    const items: ActivityItem[] = [];
    let after: string | null = null;
    let page = 0;

    do {
      const result = await fetchPage({ limit: maxItems - items.length, after });
      page++;

      for (const raw of result.items) {
        const item = convert(raw);
        if (item) items.push(item);
        if (items.length >= maxItems) break;
      }
      this.logger.debug("collector", `${label}: page ${page}, ${items.length}/${maxItems} collected`);

      if (result.items.length === 0) break;
      after = result.after;
    } while (after && items.length < maxItems);

    return items;
  }

  /**
   * Fetches up to `maxItems` of the user's newest submissions and comments
   * combined, newest first. Each listing is read up to `maxItems` before the
   * merge, so a run may request up to twice that many items.
   */
  async collect(username: string, maxItems: number): Promise<ActivityItem[]> {
    if (!username.trim()) {
      throw new TypeError("username must not be empty");
    }
    if (!Number.isInteger(maxItems) || maxItems < 1) {
      throw new RangeError(`maxItems must be a positive integer, got ${maxItems}`);
    }

    this.logger.info("collector", `Fetching up to ${maxItems} items for u/${username}...`);
    await this.client.ensureUserExists(username);

    const submissions = await this.paginate(
      "submissions",
      (request) => this.client.getSubmissions(username, request),
      submissionToActivity,
      maxItems
    );
    const comments = await this.paginate(
      "comments",
      (request) => this.client.getComments(username, request),
      commentToActivity,
      maxItems
    );

    const items = mergeByRecency(submissions, comments, maxItems);
    const kept = items.filter((item) => item.kind === "submission").length;
    this.logger.info("collector", `✅ Collected ${kept} submissions and ${items.length - kept} comments`);
    return items;
  }
}
