import type { Server } from 'http';
import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { createApp, type AppEnv } from '../src/app.js';
import type { CredentialVerifier } from '../src/modules/auth/credentials.js';
import type { SessionManager } from '../src/core/sessionManager.js';
import { buildManager } from './helpers.js';

const env: AppEnv = {
  NODE_ENV: 'test',
  CLIENT_ORIGINS: ['http://localhost:5173'],
  TOKEN_NAME: 'authorization',
  TOKEN_SOURCES: ['header', 'query', 'cookie'],
  ADMIN_USER_TYPES: ['admin'],
  RATE_LIMIT_WINDOW_MIN: 15,
  RATE_LIMIT_MAX: 1000,
  LOGIN_RATE_LIMIT_MAX: 100
};

const users: Record<string, { id: string; userType: string; password: string }> = {
  ana: { id: 'u1', userType: 'user', password: 'test-secret' },
  root: { id: 'a1', userType: 'admin', password: 'test-secret' }
};

const verifyCredentials: CredentialVerifier = async (username, password) => {
  const user = users[username];
  if (!user || user.password !== password) return null;
  return { id: user.id, userType: user.userType };
};

// fetch tipa json() como unknown
async function readJson(res: Response) {
  return JSON.parse(await res.text());
}

interface LoginResponse {
  token: string;
  session: { id: string; userKey: string; sessionKey: string; deviceType: string; token?: string };
}

describe('API', () => {
  let server: Server;
  let baseUrl: string;
  let manager: SessionManager;

  beforeEach(async () => {
    manager = buildManager().manager;
    const app = createApp({ env, manager, verifyCredentials });
    server = await new Promise<Server>(resolve => {
      const s = app.listen(0, '127.0.0.1', () => resolve(s));
    });
    const address = server.address();
    if (!address || typeof address === 'string') throw new Error('servidor sin puerto');
    baseUrl = `http://127.0.0.1:${address.port}/api/v1`;
  });

  afterEach(async () => {
    await new Promise<void>((resolve, reject) => server.close(err => (err ? reject(err) : resolve())));
  });

  async function login(username: string, extra: Record<string, unknown> = {}) {
    const res = await fetch(`${baseUrl}/auth/login`, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: JSON.stringify({ username, password: 'test-secret', ...extra })
    });
    expect(res.status).toBe(201);
    const body: LoginResponse = await readJson(res);
    return body;
  }

  it('health', async () => {
    const res = await fetch(`${baseUrl}/health`);
    expect(res.status).toBe(200);
    expect((await readJson(res)).status).toBe('ok');
  });

  it('login devuelve el token y la sesión sin token', async () => {
    const body = await login('ana', { deviceType: 'mobile', deviceName: 'Pixel' });
    expect(body.token).toMatch(/^[0-9A-Za-z]+$/);
    expect(body.session.userKey).toBe('auth_user_u1');
    expect(body.session.deviceType).toBe('mobile');
    expect(body.session.token).toBeUndefined();
  });

  it('credenciales inválidas: 401', async () => {
    const res = await fetch(`${baseUrl}/auth/login`, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: JSON.stringify({ username: 'ana', password: 'mala' })
    });
    expect(res.status).toBe(401);
    expect((await readJson(res)).message).toBe('Credenciales inválidas');
  });

  it('cuerpo inválido: 400', async () => {
    const res = await fetch(`${baseUrl}/auth/login`, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: JSON.stringify({ username: 'ana', password: 'test-secret', timeout: 5 })
    });
    expect(res.status).toBe(400);
    expect((await readJson(res)).message).toBe('Datos inválidos');
  });

  it('acepta el token por cabecera, Bearer, query y cookie', async () => {
    const { token } = await login('ana');
    const requests: Array<[string, RequestInit]> = [
      [`${baseUrl}/auth/me`, { headers: { authorization: token } }],
      [`${baseUrl}/auth/me`, { headers: { authorization: `Bearer ${token}` } }],
      [`${baseUrl}/auth/me?authorization=${token}`, {}],
      [`${baseUrl}/auth/me`, { headers: { cookie: `authorization=${token}` } }]
    ];
    for (const [url, init] of requests) {
      const res = await fetch(url, init);
      expect(res.status).toBe(200);
      expect((await readJson(res)).id).toBe('u1');
    }
  });

  it('si la primera fuente no verifica prueba la siguiente', async () => {
    const { token } = await login('ana');
    const res = await fetch(`${baseUrl}/auth/me?authorization=${token}`, { headers: { authorization: 'basura' } });
    expect(res.status).toBe(200);
  });

  it('sin token no se rechaza la petición, pero /me exige sesión', async () => {
    const health = await fetch(`${baseUrl}/health`, { headers: { authorization: 'basura' } });
    expect(health.status).toBe(200);

    const me = await fetch(`${baseUrl}/auth/me`);
    expect(me.status).toBe(401);
    expect((await readJson(me)).code).toBe('NOT_AUTHENTICATED');
  });

  it('peticiones concurrentes ven cada una su propia sesión', async () => {
    const ana = await login('ana');
    const root = await login('root');
    const results = await Promise.all(
      [ana.token, root.token, ana.token, root.token].map(async token => {
        const res = await fetch(`${baseUrl}/auth/me`, { headers: { authorization: token } });
        return (await readJson(res)).id;
      })
    );
    expect(results).toEqual(['u1', 'a1', 'u1', 'a1']);
  });

  it('el contexto no queda fijado tras la respuesta', async () => {
    const { token } = await login('ana');
    await fetch(`${baseUrl}/auth/me`, { headers: { authorization: token } });
    expect(manager.currentSession()).toBeUndefined();
  });

  it('logout invalida el token actual', async () => {
    const { token } = await login('ana');
    const out = await fetch(`${baseUrl}/auth/logout`, { method: 'POST', headers: { authorization: token } });
    expect(out.status).toBe(204);
    const me = await fetch(`${baseUrl}/auth/me`, { headers: { authorization: token } });
    expect(me.status).toBe(401);
  });

  it('logout sin sesión: 401', async () => {
    const res = await fetch(`${baseUrl}/auth/logout`, { method: 'POST' });
    expect(res.status).toBe(401);
  });

  it('devices lista las sesiones del usuario y marca la actual', async () => {
    const web = await login('ana', { deviceType: 'web' });
    const mobile = await login('ana', { deviceType: 'mobile' });
    const res = await fetch(`${baseUrl}/auth/devices`, { headers: { authorization: mobile.token } });
    expect(res.status).toBe(200);
    const { data }: { data: Array<{ sessionKey: string; current: boolean; token?: string }> } = await readJson(res);
    expect(data).toHaveLength(2);
    expect(data.find(d => d.sessionKey === mobile.session.sessionKey)?.current).toBe(true);
    expect(data.find(d => d.sessionKey === web.session.sessionKey)?.current).toBe(false);
    expect(data.every(d => d.token === undefined)).toBe(true);
  });

  describe('administración de sesiones', () => {
    it('exige sesión y userType de administración', async () => {
      const anon = await fetch(`${baseUrl}/sessions/users`);
      expect(anon.status).toBe(401);

      const { token } = await login('ana');
      const user = await fetch(`${baseUrl}/sessions/users`, { headers: { authorization: token } });
      expect(user.status).toBe(403);
    });

    it('lista usuarios, expulsa sesiones y usuarios, limpia y vacía', async () => {
      const admin = await login('root');
      const auth = { authorization: admin.token };
      const first = await login('ana');
      const second = await login('ana');

      const list = await fetch(`${baseUrl}/sessions/users`, { headers: auth });
      expect((await readJson(list)).data.sort()).toEqual(['auth_admin_a1', 'auth_user_u1']);

      const sessions = await fetch(`${baseUrl}/sessions/users/auth_user_u1`, { headers: auth });
      expect((await readJson(sessions)).meta.total).toBe(2);

      const kickOne = await fetch(
        `${baseUrl}/sessions/users/auth_user_u1/${first.session.sessionKey}`,
        { method: 'DELETE', headers: auth }
      );
      expect(kickOne.status).toBe(204);
      expect((await fetch(`${baseUrl}/auth/me`, { headers: { authorization: first.token } })).status).toBe(401);
      expect((await fetch(`${baseUrl}/auth/me`, { headers: { authorization: second.token } })).status).toBe(200);

      const kickUser = await fetch(`${baseUrl}/sessions/users/auth_user_u1`, { method: 'DELETE', headers: auth });
      expect(kickUser.status).toBe(204);
      expect((await fetch(`${baseUrl}/auth/me`, { headers: { authorization: second.token } })).status).toBe(401);

      const sweep = await fetch(`${baseUrl}/sessions/sweep`, { method: 'POST', headers: auth });
      expect(await readJson(sweep)).toEqual({ removed: 0 });

      const clear = await fetch(`${baseUrl}/sessions`, { method: 'DELETE', headers: auth });
      expect(clear.status).toBe(204);
      expect((await fetch(`${baseUrl}/auth/me`, { headers: auth })).status).toBe(401);
    });

    it('valida los parámetros', async () => {
      const admin = await login('root');
      const res = await fetch(`${baseUrl}/sessions/users/auth_user_u1/no-es-hex`, {
        method: 'DELETE',
        headers: { authorization: admin.token }
      });
      expect(res.status).toBe(400);
    });
  });

  it('fuera de /api/v1 no se verifican tokens', async () => {
    const verify = vi.spyOn(manager, 'verifyToken');
    const res = await fetch(baseUrl.replace('/api/v1', '/x'), { headers: { authorization: 'z'.repeat(15_000) } });
    expect(res.status).toBe(404);
    expect(verify).not.toHaveBeenCalled();
  });

  it('un token demasiado largo no autentica', async () => {
    const verify = vi.spyOn(manager, 'verifyToken');
    const res = await fetch(`${baseUrl}/auth/me`, { headers: { authorization: 'z'.repeat(15_000) } });
    expect(res.status).toBe(401);
    await expect(verify.mock.results[0].value).resolves.toBe(false);
  });

  it('404 para rutas desconocidas', async () => {
    const res = await fetch(`${baseUrl}/nada`);
    expect(res.status).toBe(404);
    expect((await readJson(res)).message).toBe('Recurso no encontrado');
  });
});
