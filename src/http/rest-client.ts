import { ApiError, AuthenticationError, RateLimitError } from "../errors";
import { Trace } from "../util/trace";

export const DEFAULT_API_BASE_URL = "https://discord.com/api/v10";

const ContentTypeJson = "application/json";

export type HttpMethod = "GET" | "POST" | "PATCH" | "PUT" | "DELETE";

export type QueryParameters = Record<string, string | number | boolean>;

export interface RestClientConfig {
    /** Root of every request path */
    baseUrl?: string;
    /** Sent as the User-Agent header */
    userAgent?: string;
    /** Abort requests that take longer than this */
    requestTimeoutMs?: number;
    /** Defaults to the global fetch */
    fetch?: typeof fetch;
}

interface RawResponse {
    status: number;
    statusText: string;
    headers: Headers;
    body: unknown;
}

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === "object" && value !== null && !Array.isArray(value);
}

function describe(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}

/**
 * Stateless request executor for the REST API. Successful responses resolve
 * to their parsed body; every failure is raised as an ApiError subclass.
 */
export class RestClient {
    private readonly config: Required<RestClientConfig>;

    constructor(
        private readonly token: string,
        config: RestClientConfig = {}
    ) {
        this.config = {
            baseUrl: config.baseUrl ?? DEFAULT_API_BASE_URL,
            userAgent: config.userAgent ?? "DiscordBot (chat-gateway, 0.1.0)",
            requestTimeoutMs: config.requestTimeoutMs ?? 30000,
            fetch: config.fetch ?? ((input, init) => fetch(input, init))
        };
    }

    get(path: string, query: QueryParameters = {}): Promise<unknown> {
        return this.request("GET", path, query);
    }

    post(path: string, body: unknown = {}): Promise<unknown> {
        return this.request("POST", path, {}, body);
    }

    patch(path: string, body: unknown = {}): Promise<unknown> {
        return this.request("PATCH", path, {}, body);
    }

    put(path: string, body: unknown = {}): Promise<unknown> {
        return this.request("PUT", path, {}, body);
    }

    delete(path: string): Promise<unknown> {
        return this.request("DELETE", path);
    }

    buildUrl(path: string, query: QueryParameters = {}): string {
        const entries = Object.entries(query);
        if (entries.length === 0) {
            return this.config.baseUrl + path;
        }
        const search = new URLSearchParams();
        for (const [key, value] of entries) {
            search.append(key, String(value));
        }
        return `${this.config.baseUrl}${path}?${search.toString()}`;
    }

    private request(method: HttpMethod, path: string, query: QueryParameters = {}, body?: unknown): Promise<unknown> {
        return Trace.dependency(method, path, async () => {
            const response = await this.send(method, this.buildUrl(path, query), body);
            if (response.status >= 400) {
                throw translateError(response);
            }
            return response.body;
        });
    }

    private async send(method: HttpMethod, url: string, body?: unknown): Promise<RawResponse> {
        const controller = new AbortController();
        const timeoutId = setTimeout(() => {
            Trace.warn(`${method} ${url} - Request timeout after ${this.config.requestTimeoutMs}ms`);
            controller.abort();
        }, this.config.requestTimeoutMs);

        try {
            const response = await this.config.fetch(url, {
                method,
                headers: {
                    "Authorization": `Bot ${this.token}`,
                    "User-Agent": this.config.userAgent,
                    "Content-Type": ContentTypeJson
                },
                body: body !== undefined && method !== "GET" && method !== "DELETE"
                    ? JSON.stringify(body)
                    : undefined,
                signal: controller.signal
            });

            return {
                status: response.status,
                statusText: response.statusText,
                headers: response.headers,
                body: await parseBody(response)
            };
        }
        catch (error) {
            if (error instanceof Error && error.name === "AbortError") {
                throw new ApiError(`${method} ${url} timed out`, 408);
            }
            throw new ApiError(`Network request failed: ${describe(error)}`, 0);
        }
        finally {
            clearTimeout(timeoutId);
        }
    }
}

async function parseBody(response: Response): Promise<unknown> {
    const text = await response.text();
    if (text.length === 0) {
        return null;
    }
    try {
        return JSON.parse(text);
    }
    catch {
        return text;
    }
}

function translateError(response: RawResponse): ApiError {
    if (response.status === 401) {
        return new AuthenticationError();
    }

    const body = response.body;
    if (response.status === 429) {
        const header = response.headers.get("retry-after");
        const retryAfter = header !== null
            ? Number(header)
            : isRecord(body) && typeof body.retry_after === "number" ? body.retry_after : NaN;
        if (Number.isFinite(retryAfter)) {
            return new RateLimitError(retryAfter);
        }
    }

    if (isRecord(body) && typeof body.message === "string") {
        const code = typeof body.code === "number" ? body.code : undefined;
        const prefix = code !== undefined ? `API error (${code})` : "API error";
        return new ApiError(`${prefix}: ${body.message}`, response.status, code);
    }
    return new ApiError(`API error: ${response.status} ${response.statusText}`, response.status);
}
