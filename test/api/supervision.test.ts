import type { Server } from 'node:http';
import type { AddressInfo } from 'node:net';
import { afterAll, beforeAll, describe, expect, it } from 'vitest';
import { createApp } from '../../src/api/app.js';
import { Supervisor } from '../../src/services/supervision/index.js';

let server: Server;
let baseUrl: string;

beforeAll(async () => {
  const app = createApp(new Supervisor());
  server = await new Promise<Server>((resolve) => {
    const s = app.listen(0, '127.0.0.1', () => resolve(s));
  });
  const address: AddressInfo | string | null = server.address();
  if (address === null || typeof address === 'string') throw new Error('Server did not bind to a TCP port');
  baseUrl = `http://127.0.0.1:${address.port}`;
});

afterAll(async () => {
  await new Promise<void>((resolve, reject) => server.close((error) => (error ? reject(error) : resolve())));
});

function post(path: string, body: unknown): Promise<Response> {
  return fetch(`${baseUrl}${path}`, {
    method: 'POST',
    headers: { 'content-type': 'application/json' },
    body: JSON.stringify(body),
  });
}

describe('supervision API', () => {
  it('answers the liveness probe', async () => {
    const res = await fetch(`${baseUrl}/health`);
    expect(res.status).toBe(200);
    expect(await res.json()).toMatchObject({ status: 'ok' });
  });

  it('reports no data before any supervision', async () => {
    const res = await fetch(`${baseUrl}/supervision/health`);
    expect(await res.json()).toEqual({
      success: true,
      data: { status: 'no_data', confidence: 0, activeAlerts: 0 },
      error: null,
    });
  });

  it('supervises a stage output', async () => {
    const res = await post('/supervision/stages/trajectory', {
      output: { orbital_period: 1, orbital_elements: { semi_major_axis: 1 } },
      context: { runId: 'run-api' },
    });
    expect(res.status).toBe(200);
    expect(await res.json()).toMatchObject({
      success: true,
      data: { stageName: 'trajectory', supervised: true, isValid: true, recommendation: 'continue' },
    });
  });

  it('returns 404 for an unregistered stage', async () => {
    const res = await post('/supervision/stages/renderer', { output: {} });
    expect(res.status).toBe(404);
    expect(await res.json()).toMatchObject({ success: false, error: { code: 'STAGE_NOT_REGISTERED' } });
  });

  it('returns 422 for an invalid body', async () => {
    const res = await post('/supervision/stages/trajectory', { output: 'nope' });
    expect(res.status).toBe(422);
    expect(await res.json()).toMatchObject({ success: false, error: { code: 'VALIDATION_ERROR' } });
  });

  it('returns 400 for malformed JSON', async () => {
    const res = await fetch(`${baseUrl}/supervision/runs`, {
      method: 'POST',
      headers: { 'content-type': 'application/json' },
      body: '{"runId":',
    });
    expect(res.status).toBe(400);
    expect(await res.json()).toMatchObject({ success: false, error: { code: 'VALIDATION_ERROR' } });
  });

  it('supervises a run and exposes its alerts', async () => {
    const res = await post('/supervision/runs', { runId: 'run-broken', asteroidData: { name: null } });
    expect(res.status).toBe(201);
    expect(await res.json()).toMatchObject({ success: true, data: { runId: 'run-broken', runValid: false } });

    const continueRes = await fetch(`${baseUrl}/supervision/should-continue`);
    expect(await continueRes.json()).toMatchObject({ data: { shouldContinue: false } });

    const alertsRes = await fetch(`${baseUrl}/supervision/alerts`);
    expect(await alertsRes.json()).toMatchObject({ success: true, data: expect.arrayContaining([expect.objectContaining({ level: 'critical' })]) });
  });

  it('resolves an alert by index', async () => {
    const res = await post('/supervision/alerts/0/resolve', {});
    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({ success: true, data: { resolved: true }, error: null });
  });

  it('lists active alerts with the index the resolve route takes', async () => {
    const res = await fetch(`${baseUrl}/supervision/alerts`);
    const body: unknown = await res.json();
    expect(body).toMatchObject({
      success: true,
      data: [
        { index: 1, level: 'critical', message: 'Critical validation errors detected: 6' },
        { index: 2, level: 'high' },
        { index: 3, level: 'medium' },
        { index: 4, level: 'critical', message: 'Critical validation errors detected: 6' },
      ],
    });
  });

  it('returns 404 for an unknown alert', async () => {
    const res = await post('/supervision/alerts/999/resolve', {});
    expect(res.status).toBe(404);
    expect(await res.json()).toMatchObject({ error: { code: 'ALERT_NOT_FOUND', message: "Alert '999' not found" } });
  });

  it('returns 404 for a non-numeric alert index', async () => {
    const res = await post('/supervision/alerts/first/resolve', {});
    expect(res.status).toBe(404);
  });

  it('reports stage performance', async () => {
    const res = await fetch(`${baseUrl}/supervision/stages/trajectory/performance`);
    expect(await res.json()).toMatchObject({ success: true, data: { stageName: 'trajectory', totalSupervisions: 1 } });
  });

  it('returns 404 for performance of an unregistered stage', async () => {
    const res = await fetch(`${baseUrl}/supervision/stages/renderer/performance`);
    expect(res.status).toBe(404);
  });

  it('reports status', async () => {
    const res = await fetch(`${baseUrl}/supervision/status`);
    expect(await res.json()).toMatchObject({ success: true, data: { stagesRegistered: 7, validatorsActive: 3 } });
  });

  it('serves the OpenAPI document', async () => {
    const res = await fetch(`${baseUrl}/openapi.json`);
    expect(await res.json()).toMatchObject({ info: { title: 'NEO Hazard Supervision API' } });
  });
});
