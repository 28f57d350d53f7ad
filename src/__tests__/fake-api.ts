import { z } from 'zod';

interface StoredSecret {
  id: string;
  key: string;
  value: string;
  description?: string;
  inherited_from?: string;
}

export interface RecordedCall {
  method: string;
  path: string;
}

const SecretBody = z.object({ key: z.string().optional(), value: z.string(), description: z.string().optional() });
const BulkBody = z.object({
  secrets: z.array(z.object({ key: z.string(), value: z.string(), description: z.string().optional() })),
  overwrite: z.boolean(),
});

const SECRETS_ROUTE = /^\/api\/v1\/projects\/([^/]+)\/environments\/([^/]+)\/secrets(?:\/([^/]+))?$/;

function json(data: unknown, status = 200): Response {
  return new Response(JSON.stringify(data), { status, headers: { 'Content-Type': 'application/json' } });
}

/**
 * In-process stand-in for the secrets endpoints of the KeyEnv API.
 * Install it with `vi.stubGlobal('fetch', api.fetch)`.
 */
export class FakeKeyEnvApi {
  readonly calls: RecordedCall[] = [];
  private readonly environments = new Map<string, Map<string, StoredSecret>>();
  private nextId = 1;

  constructor(private readonly token = 'test-token') {}

  seed(projectId: string, environment: string, secrets: Array<Omit<StoredSecret, 'id'>>): void {
    const store = this.store(projectId, environment);
    for (const secret of secrets) {
      store.set(secret.key, { id: `sec-${this.nextId++}`, ...secret });
    }
  }

  callsTo(method: string): RecordedCall[] {
    return this.calls.filter((call) => call.method === method);
  }

  fetch = async (input: string | URL | Request, init?: RequestInit): Promise<Response> => {
    const url = new URL(typeof input === 'string' ? input : input instanceof URL ? input.href : input.url);
    const method = init?.method ?? 'GET';
    this.calls.push({ method, path: url.pathname });

    if (new Headers(init?.headers).get('authorization') !== `Bearer ${this.token}`) {
      return json({ error: 'Invalid token', code: 'unauthorized' }, 401);
    }

    const match = SECRETS_ROUTE.exec(url.pathname);
    if (!match) {
      return json({ error: 'Route not found' }, 404);
    }
    const [, projectId, environment] = match;
    const segment: string | undefined = match[3];
    const store = this.store(projectId, environment);
    const body: unknown = typeof init?.body === 'string' ? JSON.parse(init.body) : undefined;

    if (segment === 'export' && method === 'GET') {
      return json({ secrets: [...store.values()].map((s) => this.toWire(s, environment)) });
    }

    if (segment === 'bulk' && method === 'POST') {
      const { secrets, overwrite } = BulkBody.parse(body);
      const result = { created: 0, updated: 0, skipped: 0 };
      for (const item of secrets) {
        const existing = store.get(item.key);
        if (!existing) {
          store.set(item.key, { id: `sec-${this.nextId++}`, ...item });
          result.created++;
        } else if (overwrite) {
          store.set(item.key, { ...existing, value: item.value, description: item.description });
          result.updated++;
        } else {
          result.skipped++;
        }
      }
      return json(result);
    }

    if (segment === undefined && method === 'POST') {
      const { key, value, description } = SecretBody.parse(body);
      if (key === undefined) return json({ error: 'key is required' }, 400);
      if (store.has(key)) return json({ error: 'Secret already exists', code: 'conflict' }, 409);
      const secret = { id: `sec-${this.nextId++}`, key, value, description };
      store.set(key, secret);
      return json({ secret: this.toWire(secret, environment) }, 201);
    }

    if (segment !== undefined && method === 'PUT') {
      const existing = store.get(segment);
      if (!existing) return json({ error: 'Secret not found', code: 'not_found' }, 404);
      const { value, description } = SecretBody.parse(body);
      const updated = { ...existing, value, description: description ?? existing.description };
      store.set(segment, updated);
      return json({ secret: this.toWire(updated, environment) });
    }

    if (segment !== undefined && method === 'DELETE') {
      if (!store.delete(segment)) return json({ error: 'Secret not found' }, 404);
      return new Response(null, { status: 204 });
    }

    return json({ error: 'Method not allowed' }, 405);
  };

  private store(projectId: string, environment: string): Map<string, StoredSecret> {
    const id = `${projectId}/${environment}`;
    let store = this.environments.get(id);
    if (!store) {
      store = new Map();
      this.environments.set(id, store);
    }
    return store;
  }

  private toWire(secret: StoredSecret, environment: string): Record<string, unknown> {
    return { ...secret, environment_id: `env-${environment}` };
  }
}
