import { z } from "zod";
import { HttpError } from "./errors.ts";

export interface HttpOptions {
  baseUrl: string;
  headers?: Record<string, string> | (() => Promise<Record<string, string>>);
}

export interface RequestOptions {
  params?: Record<string, string | undefined>;
}

export class HttpClient {
  constructor(private opts: HttpOptions) {}

  private async send(path: string, options: RequestOptions): Promise<Response> {
    const { params } = options;

    let url = `${this.opts.baseUrl}${path}`;
    if (params) {
      const searchParams = new URLSearchParams();
      for (const [key, value] of Object.entries(params)) {
        if (value !== undefined && value !== "") {
          searchParams.set(key, value);
        }
      }
      const qs = searchParams.toString();
      if (qs) url += `?${qs}`;
    }

    const base = typeof this.opts.headers === "function"
      ? await this.opts.headers()
      : this.opts.headers;
    const res = await fetch(url, { headers: { ...base } });
    if (!res.ok) {
      const text = await res.text().catch(() => "");
      throw new HttpError(res.status, "GET", path, text);
    }
    return res;
  }

  /**
   * JSON request validated against `schema`; resolves to undefined on 204.
   * A body that does not match the schema throws.
   */
  async request<S extends z.ZodTypeAny>(path: string, schema: S, options: RequestOptions = {}): Promise<z.infer<S> | undefined> {
    const res = await this.send(path, options);
    if (res.status === 204) return undefined;
    const data: unknown = await res.json();
    const parsed = schema.safeParse(data);
    if (!parsed.success) {
      throw new Error(`Unexpected response from ${path}: ${parsed.error.issues[0]?.message ?? "invalid body"}`);
    }
    return parsed.data;
  }

  async get<S extends z.ZodTypeAny>(path: string, schema: S, params?: Record<string, string | undefined>): Promise<z.infer<S> | undefined> {
    return this.request(path, schema, { params });
  }

  async getBuffer(path: string, params?: Record<string, string | undefined>): Promise<Buffer> {
    const res = await this.send(path, { params });
    return Buffer.from(await res.arrayBuffer());
  }
}
