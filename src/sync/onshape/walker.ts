import { START_CURSOR, type PageCursor, type ParentRef, type RemoteEntity, type ResourceType } from "@/sync/types";
import { MalformedResponseError, describeError } from "@/sync/errors";
import type { RequestGovernor } from "@/sync/http/governor";
import { createChildLogger } from "@/sync/logger";
import { expectSuccess, type OnshapeClient } from "./client";
import { positionOf, type DecodedPage } from "./pagination";
import { RESOURCES, type Enrichment } from "./resources";

const log = createChildLogger("walker");

/** One item of a page: a decoded entity, or an item that could not be decoded. */
export type WalkItem =
  | { ok: true; entity: RemoteEntity }
  | { ok: false; key: string; error: MalformedResponseError };

export type WalkStatus = "complete" | "interrupted" | "cancelled";

export interface WalkOutcome {
  status: WalkStatus;
  /**
   * Where to resume: the page that failed or was never fetched, `start`
   * for a first page that takes no cursor. Null once complete.
   */
  cursor: PageCursor | null;
  pagesFetched: number;
  error?: Error;
}

export interface WalkOptions {
  signal?: AbortSignal;
}

export class HierarchyWalker {
  constructor(
    private readonly client: OnshapeClient,
    private readonly governor: RequestGovernor,
    private readonly pageSize: number,
  ) {}

  get concurrency(): number {
    return this.governor.concurrency;
  }

  /**
   * Lazily enumerate one level under one parent, page by page, in server
   * order. The generator's return value reports how far it got; a failed
   * page ends the walk for this parent only, and its cursor resumes it.
   */
  async *walk(
    resourceType: ResourceType,
    parent: ParentRef | null = null,
    cursor: PageCursor | null = null,
    options: WalkOptions = {},
  ): AsyncGenerator<WalkItem, WalkOutcome, undefined> {
    const resource = RESOURCES[resourceType];
    const endpoint = resource.endpoint(parent);
    let current = cursor ?? resource.pagination.initialCursor();
    let pagesFetched = 0;
    let position = positionOf(current);

    for (;;) {
      if (options.signal?.aborted) {
        log.info("Walk cancelled between pages", { resourceType, parent: parent?.key, pagesFetched });
        return { status: "cancelled", cursor: current ?? START_CURSOR, pagesFetched };
      }

      const pageCursor = current;
      let page: DecodedPage;
      try {
        page = await this.governor.execute(async () => {
          const response = await this.client.send("GET", endpoint, {
            ...resource.query,
            ...resource.pagination.query(pageCursor, this.pageSize),
          });
          return resource.pagination.decode(expectSuccess(response), pageCursor, this.pageSize);
        }, `${resourceType} ${endpoint}`);
      } catch (error) {
        log.warn("Page fetch failed, stopping walk for this parent", {
          resourceType,
          parent: parent?.key,
          cursor: pageCursor,
          error: describeError(error),
        });
        return {
          status: "interrupted",
          cursor: pageCursor ?? START_CURSOR,
          pagesFetched,
          error: error instanceof Error ? error : new Error(String(error)),
        };
      }

      pagesFetched++;
      for (const item of page.items) {
        const decoded = decodeItem(resourceType, item, parent, position);
        position++;
        if (decoded.ok && resource.enrichment) {
          yield { ok: true, entity: await this.enrich(resource.enrichment, decoded.entity) };
        } else {
          yield decoded;
        }
      }

      if (!page.next) {
        return { status: "complete", cursor: null, pagesFetched };
      }
      current = page.next;
    }
  }

  private async enrich(enrichment: Enrichment, entity: RemoteEntity): Promise<RemoteEntity> {
    const endpoint = enrichment.endpoint(entity);
    try {
      const payload = await this.governor.execute(async () => {
        const response = await this.client.send("GET", endpoint, enrichment.query(entity));
        return expectSuccess(response);
      }, `enrich ${endpoint}`);
      return enrichment.apply(entity, payload);
    } catch (error) {
      log.debug("Enrichment unavailable, mirroring without it", { key: entity.key, endpoint, error: describeError(error) });
      return enrichment.apply(entity, null);
    }
  }
}

function decodeItem(resourceType: ResourceType, item: unknown, parent: ParentRef | null, position: number): WalkItem {
  try {
    return { ok: true, entity: RESOURCES[resourceType].decode(item, parent) };
  } catch (error) {
    if (error instanceof MalformedResponseError) {
      const key = `${parent?.key ?? "root"}#${resourceType}[${position}]`;
      log.warn("Skipping undecodable item", { resourceType, key, error: error.message });
      return { ok: false, key, error };
    }
    throw error;
  }
}
