import type { FetchLike } from "../../packages/core/src/index.js";

export const API_URL = "https://wiki.test/w/api.php";

export interface RecordedCall {
  method: string;
  params: URLSearchParams;
  headers: Record<string, string>;
}

export type RouteHandler = (call: RecordedCall) => Response | Promise<Response>;

export function jsonResponse(body: unknown, init: ResponseInit = {}): Response {
  return new Response(JSON.stringify(body), {
    status: 200,
    headers: { "Content-Type": "application/json" },
    ...init,
  });
}

/** Route key: "tokens:login", "tokens:csrf", or the action name */
export function routeKey(params: URLSearchParams): string {
  const action = params.get("action") ?? "";
  if (action === "query" && params.get("meta") === "tokens") {
    return `tokens:${params.get("type") ?? "csrf"}`;
  }
  return action;
}

const DEFAULT_ROUTES: Record<string, RouteHandler> = {
  "tokens:login": () => jsonResponse({ batchcomplete: "", query: { tokens: { logintoken: "login-token+\\" } } }),
  login: () => jsonResponse({ login: { result: "Success", lguserid: 7, lgusername: "Admin" } }),
  "tokens:csrf": () => jsonResponse({ batchcomplete: "", query: { tokens: { csrftoken: "csrf-token+\\" } } }),
  setpagelanguage: (call) =>
    jsonResponse({
      setpagelanguage: { title: call.params.get("title"), pageid: 1, to: call.params.get("lang"), logid: 1 },
    }),
};

/**
 * In-process stand-in for a MediaWiki api.php endpoint
 */
export function createFakeWiki(routes: Record<string, RouteHandler> = {}) {
  const calls: RecordedCall[] = [];
  const handlers = { ...DEFAULT_ROUTES, ...routes };

  const fetch: FetchLike = async (url, init) => {
    const method = init.method ?? "GET";
    const params = method === "GET"
      ? new URL(url).searchParams
      : new URLSearchParams(typeof init.body === "string" ? init.body : "");
    const headers: Record<string, string> = {};
    if (init.headers && !Array.isArray(init.headers) && !(init.headers instanceof Headers)) {
      Object.assign(headers, init.headers);
    }

    const call = { method, params, headers };
    calls.push(call);

    const handler = handlers[routeKey(params)];
    if (!handler) {
      throw new Error(`fake wiki has no route for ${routeKey(params)}`);
    }
    return handler(call);
  };

  return {
    fetch,
    calls,
    writes: () => calls.filter((call) => call.params.get("action") === "setpagelanguage"),
  };
}
