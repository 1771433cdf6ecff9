// tests/helpers/mockAgentServer.ts

import { createServer } from 'http';
import type { AddressInfo } from 'net';

import express, { type Request, type Response } from 'express';

export type ReceivedCall = {
  path: string;
  correlationHeader: string | undefined;
  body: unknown;
};

export type MockAgentServer = {
  url: string;
  calls: ReceivedCall[];
  hits(path: string): number;
  close(): Promise<void>;
};

function readEnvelope(body: unknown): { id: unknown; taskText: string } {
  if (typeof body !== 'object' || body === null) return { id: null, taskText: '' };

  const id = 'id' in body ? body.id : null;
  const params = 'params' in body ? body.params : undefined;
  const taskText =
    typeof params === 'object' && params !== null && 'task_text' in params && typeof params.task_text === 'string'
      ? params.task_text
      : '';

  return { id, taskText };
}

/**
 * Remote agents served in-process on 127.0.0.1:
 * - /echo answers "echo: <task>"
 * - /remote-error answers with an error envelope
 * - /broken answers HTTP 500
 * - /down answers HTTP 503
 */
export async function startMockAgentServer(): Promise<MockAgentServer> {
  const calls: ReceivedCall[] = [];
  const app = express();
  app.use(express.json());

  const record = (req: Request) => {
    const body: unknown = req.body;
    calls.push({ path: req.path, correlationHeader: req.header('x-correlation-id'), body });
    return readEnvelope(body);
  };

  app.post('/echo', (req: Request, res: Response) => {
    const { id, taskText } = record(req);
    res.status(200).json({ result: { text: `echo: ${taskText}` }, id });
  });

  app.get('/echo/health', (_req: Request, res: Response) => {
    res.status(200).json({ status: 'ok' });
  });

  app.post('/remote-error', (req: Request, res: Response) => {
    const { id } = record(req);
    res.status(200).json({ error: { code: -32001, message: 'agent refused' }, id });
  });

  app.post('/broken', (req: Request, res: Response) => {
    record(req);
    res.status(500).send('boom');
  });

  app.post('/down', (req: Request, res: Response) => {
    record(req);
    res.status(503).send('unavailable');
  });

  const server = createServer(app);
  await new Promise<void>((resolve) => server.listen(0, '127.0.0.1', resolve));

  const address: AddressInfo | string | null = server.address();
  const port = typeof address === 'object' && address !== null ? address.port : 0;

  return {
    url: `http://127.0.0.1:${port}`,
    calls,
    hits: (path: string) => calls.filter((c) => c.path === path).length,
    close: () =>
      new Promise<void>((resolve, reject) => {
        server.closeAllConnections();
        server.close((err) => (err ? reject(err) : resolve()));
      }),
  };
}
