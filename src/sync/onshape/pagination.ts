import { z } from "zod";
import type { PageCursor } from "@/sync/types";
import { MalformedResponseError } from "@/sync/errors";
import type { QueryParams } from "./signing";

export interface DecodedPage {
  items: unknown[];
  next: PageCursor | null;
}

/**
 * How one endpoint splits its collection into pages. The walker stays
 * agnostic: it asks for the query of a cursor, then for the items and the
 * next cursor of the payload that came back.
 */
export interface PaginationStrategy {
  readonly name: string;
  /** Cursor of the first page; null when the first page needs none. */
  initialCursor(): PageCursor | null;
  query(cursor: PageCursor | null, pageSize: number): QueryParams;
  /** Throws `MalformedResponseError` when the envelope is not what the strategy expects. */
  decode(payload: unknown, cursor: PageCursor | null, pageSize: number): DecodedPage;
}

const itemsSchema = z.array(z.unknown());

function readItems(payload: unknown, itemsKey: string | null, strategy: string): unknown[] {
  const source = itemsKey === null ? payload : readField(payload, itemsKey);
  const parsed = itemsSchema.safeParse(source);
  if (!parsed.success) {
    const where = itemsKey === null ? "top level" : `"${itemsKey}"`;
    throw new MalformedResponseError(`${strategy} page has no item array at ${where}`);
  }
  return parsed.data;
}

function readField(payload: unknown, key: string): unknown {
  if (payload === null || typeof payload !== "object" || Array.isArray(payload)) {
    return undefined;
  }
  return Object.getOwnPropertyDescriptor(payload, key)?.value;
}

/**
 * `offset` / `limit` paging. The next page exists when the envelope has a
 * non-empty `next` link, or, without one, while `offset + count < total`,
 * or, without a total either, while pages come back full.
 */
export class OffsetPagination implements PaginationStrategy {
  readonly name = "offset";

  constructor(private readonly itemsKey = "items") {}

  initialCursor(): PageCursor {
    return { kind: "offset", offset: 0 };
  }

  query(cursor: PageCursor | null, pageSize: number): QueryParams {
    return { offset: offsetOf(cursor), limit: pageSize };
  }

  decode(payload: unknown, cursor: PageCursor | null, pageSize: number): DecodedPage {
    const items = readItems(payload, this.itemsKey, this.name);
    const offset = offsetOf(cursor);
    const reached = offset + items.length;
    if (items.length === 0) {
      return { items, next: null };
    }

    const nextLink = readField(payload, "next");
    const total = readField(payload, "totalCount") ?? readField(payload, "total");
    let hasMore: boolean;
    if (nextLink !== undefined) {
      hasMore = typeof nextLink === "string" && nextLink.length > 0;
    } else if (typeof total === "number") {
      hasMore = reached < total;
    } else {
      hasMore = items.length >= pageSize;
    }

    return { items, next: hasMore ? { kind: "offset", offset: reached } : null };
  }
}

/** Continuation-token paging: the payload names the token of the next page. */
export class TokenPagination implements PaginationStrategy {
  readonly name = "token";

  constructor(
    private readonly itemsKey = "items",
    private readonly tokenKey = "nextCursor",
    private readonly tokenParam = "cursor",
  ) {}

  initialCursor(): null {
    return null;
  }

  query(cursor: PageCursor | null, pageSize: number): QueryParams {
    if (cursor?.kind === "offset") {
      throw new TypeError("Token pagination cannot resume from an offset cursor");
    }
    return { limit: pageSize, [this.tokenParam]: cursor?.kind === "token" ? cursor.token : undefined };
  }

  decode(payload: unknown, cursor: PageCursor | null = null): DecodedPage {
    const items = readItems(payload, this.itemsKey, this.name);
    const token = readField(payload, this.tokenKey);
    if (token === undefined || token === null || token === "") {
      return { items, next: null };
    }
    if (typeof token !== "string") {
      throw new MalformedResponseError(`token page has a non-string "${this.tokenKey}"`);
    }
    return { items, next: { kind: "token", token, position: positionOf(cursor) + items.length } };
  }
}

/** Endpoints that return the whole collection in one response. */
export class SinglePage implements PaginationStrategy {
  readonly name = "single";

  /** `itemsKey` null means the payload itself is the array. */
  constructor(private readonly itemsKey: string | null = null) {}

  initialCursor(): null {
    return null;
  }

  query(): QueryParams {
    return {};
  }

  decode(payload: unknown): DecodedPage {
    return { items: readItems(payload, this.itemsKey, this.name), next: null };
  }
}

/** Index of the first item on the page a cursor points at. */
export function positionOf(cursor: PageCursor | null): number {
  switch (cursor?.kind) {
    case "offset":
      return cursor.offset;
    case "token":
      return cursor.position ?? 0;
    default:
      return 0;
  }
}

function offsetOf(cursor: PageCursor | null): number {
  if (cursor === null || cursor.kind === "start") return 0;
  if (cursor.kind !== "offset") {
    throw new TypeError(`Offset pagination cannot resume from a ${cursor.kind} cursor`);
  }
  return cursor.offset;
}
