import { z } from 'zod';
import type { CredentialStore } from './credentials.js';
import { errorBodySchema, sessionSchema, type Session } from './schemas.js';

export class ApiError extends Error {
  readonly status: number;

  constructor(status: number, message: string) {
    super(message);
    this.name = 'ApiError';
    this.status = status;
  }
}

export class NotLoggedInError extends Error {
  constructor() {
    super('Not logged in. Run: swimcuts auth login');
    this.name = 'NotLoggedInError';
  }
}

type HttpMethod = 'GET' | 'POST' | 'PATCH' | 'DELETE';
type QueryValue = string | number | boolean | undefined;

export interface RequestOptions<S extends z.ZodTypeAny> {
  schema: S;
  body?: unknown;
  query?: Record<string, QueryValue>;
  auth?: boolean;
}

export function toQueryString(query: Record<string, QueryValue> = {}) {
  const params = new URLSearchParams();
  for (const [key, value] of Object.entries(query)) {
    if (value !== undefined && value !== '') {
      params.set(key, String(value));
    }
  }
  const encoded = params.toString();
  return encoded ? `?${encoded}` : '';
}

async function readError(response: Response) {
  const text = await response.text();
  try {
    const parsed = errorBodySchema.safeParse(JSON.parse(text));
    if (parsed.success) {
      return parsed.data.error;
    }
  } catch (error) {
    if (!(error instanceof SyntaxError)) throw error;
  }
  return text || response.statusText;
}

export function credentialsFromSession(session: Session, email = session.user.email) {
  return {
    accessToken: session.accessToken,
    refreshToken: session.refreshToken,
    userId: session.user.id,
    email,
    role: session.user.role,
    displayName: session.user.displayName,
    savedAt: new Date().toISOString(),
  };
}

/**
 * JSON client for the swimcuts API. An expired access token is refreshed once
 * with the stored refresh token before the request is given up.
 */
export class ApiClient {
  constructor(
    private readonly baseUrl: string,
    private readonly credentials: CredentialStore,
    private readonly fetchImpl: typeof fetch = fetch,
  ) {}

  get<S extends z.ZodTypeAny>(path: string, schema: S, query?: Record<string, QueryValue>) {
    return this.request('GET', path, { schema, query });
  }

  post<S extends z.ZodTypeAny>(path: string, schema: S, body: unknown = {}) {
    return this.request('POST', path, { schema, body });
  }

  patch<S extends z.ZodTypeAny>(path: string, schema: S, body: unknown) {
    return this.request('PATCH', path, { schema, body });
  }

  async delete(path: string, query?: Record<string, QueryValue>) {
    await this.request('DELETE', path, { schema: z.unknown(), query });
  }

  async request<S extends z.ZodTypeAny>(
    method: HttpMethod,
    path: string,
    options: RequestOptions<S>,
  ): Promise<z.infer<S>> {
    const auth = options.auth ?? true;
    let token: string | undefined;
    if (auth) {
      const stored = await this.credentials.load();
      if (!stored) {
        throw new NotLoggedInError();
      }
      token = stored.accessToken;
    }

    let response = await this.send(method, path, options, token);
    if (response.status === 401 && auth) {
      const refreshed = await this.refresh();
      if (refreshed) {
        response = await this.send(method, path, options, refreshed);
      }
    }

    if (!response.ok) {
      throw new ApiError(response.status, await readError(response));
    }

    if (response.status === 204) {
      return options.schema.parse(undefined);
    }
    return options.schema.parse(await response.json());
  }

  /** Exchanges the stored refresh token; returns the new access token, or null when that fails. */
  async refresh(): Promise<string | null> {
    const stored = await this.credentials.load();
    if (!stored) {
      return null;
    }

    const response = await this.send(
      'POST',
      '/api/v1/auth/refresh',
      { schema: sessionSchema, body: { refresh_token: stored.refreshToken } },
      undefined,
    );
    if (!response.ok) {
      return null;
    }

    const session = sessionSchema.parse(await response.json());
    await this.credentials.save(credentialsFromSession(session, stored.email));
    return session.accessToken;
  }

  private send<S extends z.ZodTypeAny>(
    method: HttpMethod,
    path: string,
    options: RequestOptions<S>,
    token: string | undefined,
  ) {
    const headers = new Headers({ Accept: 'application/json' });
    if (options.body !== undefined) {
      headers.set('Content-Type', 'application/json');
    }
    if (token) {
      headers.set('Authorization', `Bearer ${token}`);
    }

    return this.fetchImpl(`${this.baseUrl}${path}${toQueryString(options.query)}`, {
      method,
      headers,
      body: options.body === undefined ? undefined : JSON.stringify(options.body),
    });
  }
}
