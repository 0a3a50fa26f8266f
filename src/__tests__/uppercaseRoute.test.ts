import { describe, it, expect, vi, afterEach } from 'vitest';
import express from 'express';
import serverless from 'serverless-http';
import { z } from 'zod';
import { createUppercaseRouter } from '../routes/uppercase.js';
import { errorHandler } from '../middleware/errorHandler.js';
import type { UppercaseHandler } from '../services/uppercaseService.js';

const ProxyResultSchema = z.object({
  statusCode: z.number(),
  body: z.string(),
});

function routeHandler(handle: UppercaseHandler) {
  const app = express();
  app.use(express.json());
  app.use('/uppercase', createUppercaseRouter(handle));
  app.use(errorHandler);
  return serverless(app);
}

async function post(
  handler: ReturnType<typeof routeHandler>,
  body: string
): Promise<{ statusCode: number; json: unknown }> {
  const raw = await handler(
    {
      version: '2.0',
      routeKey: '$default',
      rawPath: '/uppercase',
      rawQueryString: '',
      headers: { 'content-type': 'application/json', host: 'api.test.local' },
      requestContext: {
        http: { method: 'POST', path: '/uppercase', protocol: 'HTTP/1.1', sourceIp: '127.0.0.1' },
        requestId: 'test-request',
      },
      body,
      isBase64Encoded: false,
    },
    { awsRequestId: 'test-request' }
  );
  const result = ProxyResultSchema.parse(raw);
  return { statusCode: result.statusCode, json: JSON.parse(result.body) };
}

afterEach(() => {
  vi.restoreAllMocks();
});

describe('createUppercaseRouter', () => {
  it('responds with the injected handler output', async () => {
    const handle = vi.fn<UppercaseHandler>((request) => ({ result: `[${request.input}]` }));

    const response = await post(routeHandler(handle), JSON.stringify({ input: 'abc' }));

    expect(response.statusCode).toBe(200);
    expect(response.json).toEqual({ result: '[abc]' });
    expect(handle).toHaveBeenCalledWith({ input: 'abc' });
  });

  it('does not call the handler for an invalid request', async () => {
    vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    const handle = vi.fn<UppercaseHandler>((request) => ({ result: request.input }));

    const response = await post(routeHandler(handle), JSON.stringify({ input: 1 }));

    expect(response.statusCode).toBe(400);
    expect(response.json).toMatchObject({ error: 'input must be a string' });
    expect(handle).not.toHaveBeenCalled();
  });

  it('maps an unexpected handler failure to 500', async () => {
    vi.spyOn(console, 'error').mockImplementation(() => undefined);
    const handle = vi.fn<UppercaseHandler>(() => {
      throw new Error('transform failed');
    });

    const response = await post(routeHandler(handle), JSON.stringify({ input: 'abc' }));

    expect(response.statusCode).toBe(500);
    expect(response.json).toEqual({ error: 'transform failed' });
  });
});
