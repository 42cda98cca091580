import type { AxiosAdapter } from "axios";

export interface RecordedRequest {
  method: string;
  url: string;
  params: unknown;
  body: unknown;
  authorization?: string;
}

export interface FakeReply {
  status: number;
  /** Serialized with JSON.stringify. */
  body?: unknown;
  /** Sent verbatim instead of `body`. */
  raw?: string;
}

export type FakeHandler = (request: RecordedRequest) => FakeReply | Promise<FakeReply>;

function parseSent(data: unknown): unknown {
  if (typeof data !== "string" || data === "") return data;
  return JSON.parse(data);
}

/** An in-process axios adapter that records every request it answers. */
export function createFakeAdapter(handler: FakeHandler): {
  adapter: AxiosAdapter;
  requests: RecordedRequest[];
} {
  const requests: RecordedRequest[] = [];

  const adapter: AxiosAdapter = async (config) => {
    const authorization = config.headers.get("Authorization");
    const request: RecordedRequest = {
      method: (config.method ?? "get").toLowerCase(),
      url: config.url ?? "",
      params: config.params,
      body: parseSent(config.data),
      authorization: typeof authorization === "string" ? authorization : undefined,
    };
    requests.push(request);

    const reply = await handler(request);
    return {
      data: reply.raw ?? (reply.body === undefined ? "" : JSON.stringify(reply.body)),
      status: reply.status,
      statusText: String(reply.status),
      headers: {},
      config,
    };
  };

  return { adapter, requests };
}
