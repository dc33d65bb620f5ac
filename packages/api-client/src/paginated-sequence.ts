/**
 * Paginated Sequence
 *
 * Presents a multi-page collection as one forward-only async sequence.
 * Pages are requested on demand: the first when the first item is asked
 * for, each following one only once the buffered page has been read.
 *
 * ```typescript
 * for await (const person of client.people({ nameContains: "Perkins" })) {
 *   console.log(person.name);
 *   if (done) break; // no further pages are requested
 * }
 * ```
 *
 * A failed page request rejects exactly one `next()` call; the sequence
 * is finished from then on. A consumed sequence cannot be restarted.
 */

import { describePage } from "@dtrack/shared/api";
import type { z } from "zod";
import type { ResourceClient } from "./resource-client";

type SequenceState = "active" | "terminal";

export class PaginatedSequence<T> implements AsyncIterableIterator<T> {
  private readonly client: ResourceClient;
  private readonly itemSchema: z.ZodType<T, z.ZodTypeDef, unknown>;
  private page: Iterator<T> | undefined;
  /** First page URL, then the server's `next` cursor; resolved on use */
  private cursor: string | null;
  private state: SequenceState = "active";
  private fetchCount = 0;
  private queue: Promise<unknown> = Promise.resolve();

  /**
   * @param client - Shared client used for every page request
   * @param url - Absolute URL of the first page
   * @param itemSchema - Decoder for one item of the collection
   */
  constructor(
    client: ResourceClient,
    url: string,
    itemSchema: z.ZodType<T, z.ZodTypeDef, unknown>,
  ) {
    this.client = client;
    this.itemSchema = itemSchema;
    this.cursor = url;
  }

  /** Number of page requests issued so far, failed ones included. */
  get pagesFetched(): number {
    return this.fetchCount;
  }

  /** True once the sequence can produce nothing more. */
  get finished(): boolean {
    return this.state === "terminal";
  }

  [Symbol.asyncIterator](): this {
    return this;
  }

  next(): Promise<IteratorResult<T, undefined>> {
    // Calls are served one at a time so overlapping next() calls
    // neither fetch a page twice nor reorder items.
    const result = this.queue.then(() => this.advance());
    this.queue = result.catch(() => undefined);
    return result;
  }

  /** Stop early. Pages not yet requested are never requested. */
  async return(): Promise<IteratorResult<T, undefined>> {
    this.finish();
    return { done: true, value: undefined };
  }

  /**
   * Read the remaining items into an array.
   *
   * @param max - Stop after this many items; later pages are not requested
   */
  async collect(max = Number.POSITIVE_INFINITY): Promise<T[]> {
    const items: T[] = [];
    while (items.length < max) {
      const step = await this.next();
      if (step.done) {
        break;
      }
      items.push(step.value);
    }
    return items;
  }

  private async advance(): Promise<IteratorResult<T, undefined>> {
    while (this.state === "active") {
      // Buffered
      if (this.page) {
        const step = this.page.next();
        if (!step.done) {
          return { done: false, value: step.value };
        }
        this.page = undefined;
      }

      // Terminal
      if (this.cursor === null) {
        this.finish();
        break;
      }

      // Exhausted with more
      await this.fetchNextPage(this.cursor);
    }
    return { done: true, value: undefined };
  }

  private async fetchNextPage(cursor: string): Promise<void> {
    try {
      // A cursor leading off the API origin fails like any page request
      const url = this.client.resolve(cursor);
      this.fetchCount += 1;
      const page = await this.client.fetchPage(url, this.itemSchema);
      if (this.state === "terminal") {
        // return() was called while the request was in flight
        return;
      }
      const position = describePage(page.meta);
      this.client.logger.debug(
        {
          url,
          page: position.page,
          pageCount: position.pageCount,
          items: page.objects.length,
          hasNext: position.hasMore,
        },
        "[PAGINATION] Page fetched",
      );
      this.page = page.objects[Symbol.iterator]();
      this.cursor = page.meta.next;
    } catch (error) {
      this.finish();
      throw error;
    }
  }

  private finish(): void {
    this.state = "terminal";
    this.page = undefined;
    this.cursor = null;
  }
}
