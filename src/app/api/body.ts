/**
 * Read an optional JSON body. An empty body is `{}`; a body that is not
 * JSON is reported as `invalid` so the handler can answer 400.
 */
export async function readOptionalJson(request: Request): Promise<{ ok: true; body: unknown } | { ok: false }> {
  const text = await request.text();
  if (text.trim() === "") {
    return { ok: true, body: {} };
  }
  try {
    return { ok: true, body: JSON.parse(text) };
  } catch {
    return { ok: false };
  }
}

/** `force_refresh` may come in the query string instead of the body. */
export function withQueryFlag(body: unknown, request: Request): unknown {
  const flag = new URL(request.url).searchParams.get("force_refresh");
  if (flag === null || body === null || typeof body !== "object" || Array.isArray(body)) {
    return body;
  }
  return { forceRefresh: flag, ...body };
}
