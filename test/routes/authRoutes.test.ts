import { afterAll, afterEach, beforeAll, describe, it, expect, vi } from 'vitest';
import { once } from 'node:events';
import { Server } from 'node:http';

vi.mock('../../src/config/database', async () => {
  const { createFakeDb } = await import('../helpers/fakeDb');
  return { db: createFakeDb(), pool: {} };
});

import { createApp } from '../../src/app';
import { db } from '../../src/config/database';
import { AuthService } from '../../src/services/AuthService';

let server: Server;
let baseUrl = '';

const postJson = (path: string, body: Record<string, unknown>) =>
  fetch(`${baseUrl}${path}`, {
    method: 'POST',
    headers: { 'Content-Type': 'application/json' },
    body: JSON.stringify(body)
  });

describe('auth and health routes', () => {
  beforeAll(async () => {
    server = createApp().listen(0, '127.0.0.1');
    await once(server, 'listening');
    const address = server.address();
    if (address && typeof address === 'object') {
      baseUrl = `http://127.0.0.1:${address.port}`;
    }
  });

  afterAll(async () => {
    await new Promise<void>((resolve, reject) => {
      server.close(error => (error ? reject(error) : resolve()));
    });
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('requires email and password', async () => {
    const login = vi.spyOn(AuthService, 'login');

    const res = await postJson('/login', { email: 'cook@example.com' });

    expect(res.status).toBe(400);
    expect(await res.json()).toEqual({ message: 'Email and password are required' });
    expect(login).not.toHaveBeenCalled();
  });

  it('answers 401 for bad credentials', async () => {
    vi.spyOn(AuthService, 'login').mockResolvedValue({ success: false, message: 'Invalid email or password' });

    const res = await postJson('/login', { email: 'cook@example.com', password: 'wrong-password' });

    expect(res.status).toBe(401);
    expect(await res.json()).toEqual({ message: 'Invalid email or password' });
  });

  it('returns the token on success', async () => {
    vi.spyOn(console, 'log').mockImplementation(() => undefined);
    const user = { id: 4, email: 'cook@example.com', role: 'ROLE_USER' as const };
    vi.spyOn(AuthService, 'login').mockResolvedValue({ success: true, token: 'signed-token', user });

    const res = await postJson('/login', { email: 'cook@example.com', password: 'test-password' });

    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({ message: 'Login successful', token: 'signed-token', user });
  });

  it('reports database health', async () => {
    const res = await fetch(`${baseUrl}/health`);

    expect(res.status).toBe(200);
    expect(await res.json()).toMatchObject({ status: 'healthy', database: 'connected' });
    expect(db.select).toHaveBeenCalledWith('SELECT 1 AS health_check');
  });

  it('reports an unreachable database', async () => {
    vi.spyOn(console, 'error').mockImplementation(() => undefined);
    vi.mocked(db.select).mockRejectedValueOnce(new Error('connect ECONNREFUSED'));

    const res = await fetch(`${baseUrl}/health`);

    expect(res.status).toBe(500);
    expect(await res.json()).toMatchObject({ status: 'unhealthy', database: 'disconnected' });
  });
});
