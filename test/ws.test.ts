import { describe, it, expect, beforeAll, afterAll } from 'vitest';
import { createServer, type Server } from 'node:http';
import { WebSocket } from 'ws';
import { WsServer } from '../src/interface/ws/WsServer.js';
import { AmmCore } from '../src/application/AmmCore.js';
import { InMemoryPoolStore } from '../src/infrastructure/store/InMemoryPoolStore.js';
import { InMemoryAssetLedger } from '../src/infrastructure/ledger/InMemoryAssetLedger.js';
import { CUSTODY, TOKEN_A, TOKEN_B, fund, silentLogger } from './helpers.js';

interface Message {
  type: string;
  data: Record<string, unknown>;
}

/** Buffers incoming messages so a test can await the next one of a given type */
function inbox(ws: WebSocket) {
  const received: Message[] = [];
  const waiters: Array<{ type: string; resolve: (m: Message) => void }> = [];

  ws.on('message', (raw) => {
    const message: Message = JSON.parse(raw.toString());
    const index = waiters.findIndex((w) => w.type === message.type);
    const waiter = waiters[index];
    if (waiter) {
      waiters.splice(index, 1);
      waiter.resolve(message);
    } else {
      received.push(message);
    }
  });

  return (type: string): Promise<Message> => {
    const index = received.findIndex((m) => m.type === type);
    const buffered = received[index];
    if (buffered) {
      received.splice(index, 1);
      return Promise.resolve(buffered);
    }
    return new Promise((resolve) => waiters.push({ type, resolve }));
  };
}

describe('WsServer', () => {
  const ledger = new InMemoryAssetLedger(CUSTODY);
  const wsServer = new WsServer();
  const amm = new AmmCore({
    store: new InMemoryPoolStore(),
    transfers: ledger,
    notifications: wsServer,
    feeBps: 30,
    logger: silentLogger(),
  });
  let server: Server;
  let url = '';

  beforeAll(async () => {
    server = createServer();
    wsServer.attach(server);
    await new Promise<void>((resolve) => server.listen(0, '127.0.0.1', resolve));
    const address = server.address();
    if (address === null || typeof address === 'string') throw new Error('Server is not listening on a port');
    url = `ws://127.0.0.1:${address.port}/v1/ws`;
  });

  afterAll(async () => {
    wsServer.close();
    server.closeAllConnections();
    await new Promise<void>((resolve) => server.close(() => resolve()));
  });

  it('streams events of subscribed pools', async () => {
    fund(ledger, 'alice', 100_000n, TOKEN_A, TOKEN_B);
    const poolId = amm.connect('alice').createPool(TOKEN_A, TOKEN_B, 10_000n, 20_000n);

    const client = new WebSocket(url);
    const next = inbox(client);
    await next('connected');
    expect(wsServer.clientCount).toBe(1);

    client.send(JSON.stringify({ type: 'subscribe', channel: 'pool', params: { poolId } }));
    expect((await next('subscribed')).data).toEqual({ channel: 'pool', pools: [poolId] });

    amm.connect('alice').swap(poolId, TOKEN_A, 1000n, 0n, 'bob');

    expect((await next('poolEvent')).data).toEqual({
      type: 'Swap',
      poolId,
      sender: 'alice',
      recipient: 'bob',
      assetIn: TOKEN_A,
      amountIn: '1000',
      assetOut: TOKEN_B,
      amountOut: '1813',
    });
    client.terminate();
  });

  it('answers malformed messages with an error', async () => {
    const client = new WebSocket(url);
    const next = inbox(client);
    await next('connected');

    client.send('not json');
    expect((await next('error')).data).toEqual({ message: 'Invalid message format' });

    client.send(JSON.stringify({ type: 'subscribe', channel: 'candles' }));
    expect((await next('error')).data).toEqual({ message: 'Unknown message type or channel' });
    client.terminate();
  });
});
