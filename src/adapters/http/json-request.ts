import { Agent, request } from 'undici';

export const DEFAULT_HTTP_TIMEOUT_MS = 30_000;

const USER_AGENT = 'pr-creator';

export type JsonRequestOptions = {
  body?: unknown;
  headers?: Record<string, string>;
  method?: 'GET' | 'POST';
  timeoutMs?: number;
};

export type JsonResponse = {
  /** Parsed body, or undefined when the body is empty or not JSON */
  data: unknown;
  statusCode: number;
  text: string;
};

const agents = new Map<number, Agent>();

/**
 * One keep-alive agent per timeout value, so that connect/header/body
 * timeouts match the per-request abort signal
 */
function agentFor(timeoutMs: number): Agent {
  let agent = agents.get(timeoutMs);
  if (agent === undefined) {
    agent = new Agent({
      connectTimeout: Math.min(timeoutMs, 10_000),
      headersTimeout: timeoutMs,
      bodyTimeout: timeoutMs,
    });
    agents.set(timeoutMs, agent);
  }
  return agent;
}

function parseJson(text: string): unknown {
  if (text.trim().length === 0) {
    return undefined;
  }
  try {
    const data: unknown = JSON.parse(text);
    return data;
  } catch {
    return undefined;
  }
}

export function isSuccessStatus(statusCode: number): boolean {
  return statusCode >= 200 && statusCode < 300;
}

/**
 * Send a request and read the whole body.
 *
 * Never throws on HTTP status; callers inspect `statusCode`. Network errors
 * and timeouts reject.
 */
export async function requestJson(url: string, options: JsonRequestOptions = {}): Promise<JsonResponse> {
  const timeoutMs = options.timeoutMs ?? DEFAULT_HTTP_TIMEOUT_MS;
  const hasBody = options.body !== undefined;

  const { body, statusCode } = await request(url, {
    method: options.method ?? (hasBody ? 'POST' : 'GET'),
    dispatcher: agentFor(timeoutMs),
    signal: AbortSignal.timeout(timeoutMs),
    headers: {
      Accept: 'application/json',
      'User-Agent': USER_AGENT,
      ...(hasBody && { 'Content-Type': 'application/json' }),
      ...options.headers,
    },
    ...(hasBody && { body: JSON.stringify(options.body) }),
  });

  const text = await body.text();
  return { statusCode, text, data: parseJson(text) };
}
