import { describe, it, expect, beforeAll, afterAll } from 'vitest';
import { createServer, type RequestListener, type Server } from 'node:http';
import { createApp } from '../src/interface/http/app.js';
import { AmmCore } from '../src/application/AmmCore.js';
import { InMemoryPoolStore } from '../src/infrastructure/store/InMemoryPoolStore.js';
import { TOKEN_A, TOKEN_B, failingOnSecondPush, fund, setup, silentLogger } from './helpers.js';

/** Listen on an ephemeral port for the duration of the enclosing describe */
function serve(app: RequestListener) {
  let server: Server;
  const target = { baseUrl: '' };

  beforeAll(async () => {
    server = createServer(app);
    await new Promise<void>((resolve) => server.listen(0, '127.0.0.1', resolve));
    const address = server.address();
    if (address === null || typeof address === 'string') throw new Error('Server is not listening on a port');
    target.baseUrl = `http://127.0.0.1:${address.port}/v1`;
  });

  afterAll(async () => {
    await new Promise<void>((resolve, reject) => server.close((err) => (err ? reject(err) : resolve())));
  });

  return target;
}

function poster(target: { baseUrl: string }) {
  return (path: string, body: unknown) =>
    fetch(`${target.baseUrl}${path}`, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: JSON.stringify(body),
    });
}

describe('HTTP API', () => {
  const { amm, ledger } = setup();
  fund(ledger, 'alice', 100_000n, TOKEN_A, TOKEN_B);
  const target = serve(createApp({ amm, ledger }));
  const post = poster(target);

  let poolId = '';

  it('reports health', async () => {
    const res = await fetch(`${target.baseUrl}/health`);
    expect(res.status).toBe(200);
    expect(await res.json()).toMatchObject({ status: 'healthy', feeBps: 30, pools: 0 });
  });

  it('funds an account through the ledger routes', async () => {
    const minted = await post('/ledger/mint', { asset: TOKEN_A, account: 'bob', amount: '5000' });
    expect(await minted.json()).toEqual({ asset: TOKEN_A, account: 'bob', balance: '5000' });

    const approved = await post('/ledger/approve', { asset: TOKEN_A, owner: 'bob', amount: '5000' });
    expect(await approved.json()).toEqual({ asset: TOKEN_A, owner: 'bob', allowance: '5000' });

    const res = await fetch(`${target.baseUrl}/ledger/bob/${TOKEN_A}`);
    expect(await res.json()).toEqual({ account: 'bob', asset: TOKEN_A, balance: '5000', allowance: '5000' });
  });

  it('rejects a zero mint as a validation error', async () => {
    const res = await post('/ledger/mint', { asset: TOKEN_A, account: 'bob', amount: '0' });
    expect(res.status).toBe(400);
    expect(await res.json()).toMatchObject({
      code: 'VALIDATION_ERROR',
      details: [{ path: 'amount', message: 'Must be a positive integer string' }],
    });
  });

  it('rejects a blank asset in a balance lookup', async () => {
    const res = await fetch(`${target.baseUrl}/ledger/bob/%20%20`);
    expect(res.status).toBe(400);
    expect(await res.json()).toMatchObject({ code: 'VALIDATION_ERROR', details: [{ path: 'asset' }] });
  });

  it('creates a pool', async () => {
    const res = await post('/pools', {
      sender: 'alice',
      assetA: TOKEN_B,
      assetB: TOKEN_A,
      amount0: '10000',
      amount1: '20000',
    });

    expect(res.status).toBe(201);
    const body = await res.json();
    expect(body).toMatchObject({
      asset0: TOKEN_A,
      asset1: TOKEN_B,
      reserve0: '10000',
      reserve1: '20000',
      feeBps: 30,
      feeDenominator: 10000,
      totalShares: '14142',
      holders: 1,
    });
    poolId = amm.findPoolId(TOKEN_A, TOKEN_B) ?? '';
    expect(body).toMatchObject({ poolId });
  });

  it('answers 409 for an existing pair', async () => {
    const res = await post('/pools', {
      sender: 'alice',
      assetA: TOKEN_A,
      assetB: TOKEN_B,
      amount0: '1',
      amount1: '1',
    });
    expect(res.status).toBe(409);
    expect(await res.json()).toMatchObject({ status: 'error', code: 'POOL_EXISTS' });
  });

  it('answers 404 for an unknown pool', async () => {
    const res = await fetch(`${target.baseUrl}/pools/pool_missing`);
    expect(res.status).toBe(404);
    expect(await res.json()).toMatchObject({ code: 'POOL_NOT_FOUND' });
  });

  it('quotes a swap', async () => {
    const res = await fetch(`${target.baseUrl}/pools/${poolId}/quote?assetIn=${TOKEN_A}&amountIn=1000`);
    expect(await res.json()).toEqual({
      assetIn: TOKEN_A,
      assetOut: TOKEN_B,
      amountIn: '1000',
      amountInAfterFee: '997',
      fee: '3',
      amountOut: '1813',
    });
  });

  it('executes a swap for the sender', async () => {
    const res = await post(`/pools/${poolId}/swap`, {
      sender: 'bob',
      assetIn: TOKEN_A,
      amountIn: '1000',
      minAmountOut: '1813',
    });

    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({ poolId, recipient: 'bob', amountOut: '1813' });
    expect(ledger.balanceOf(TOKEN_B, 'bob')).toBe(1813n);
    expect(amm.getPool(poolId)).toEqual([TOKEN_A, TOKEN_B, 11000n, 18187n, 30, 14142n]);
  });

  it('rejects a swap below the minimum output', async () => {
    const res = await post(`/pools/${poolId}/swap`, {
      sender: 'bob',
      assetIn: TOKEN_A,
      amountIn: '100',
      minAmountOut: '100000',
    });
    expect(res.status).toBe(400);
    expect(await res.json()).toMatchObject({ code: 'SLIPPAGE_EXCEEDED' });
  });

  it('rejects malformed amounts', async () => {
    const res = await post(`/pools/${poolId}/swap`, { sender: 'bob', assetIn: TOKEN_A, amountIn: '-5' });
    expect(res.status).toBe(400);
    expect(await res.json()).toMatchObject({
      code: 'VALIDATION_ERROR',
      details: [{ path: 'amountIn', message: 'Must be a non-negative integer string' }],
    });
  });

  it('reports share balances', async () => {
    const res = await fetch(`${target.baseUrl}/pools/${poolId}/shares/alice`);
    expect(await res.json()).toEqual({ poolId, holder: 'alice', shares: '14142' });
  });

  it('answers 404 for unknown routes', async () => {
    const res = await fetch(`${target.baseUrl}/nowhere`);
    expect(res.status).toBe(404);
    expect(await res.json()).toMatchObject({ code: 'NOT_FOUND' });
  });
});

describe('HTTP API invariant violations', () => {
  const amm = new AmmCore({
    store: new InMemoryPoolStore(),
    transfers: failingOnSecondPush(),
    feeBps: 30,
    logger: silentLogger(),
  });
  const poolId = amm.connect('alice').createPool(TOKEN_A, TOKEN_B, 1000n, 4000n);
  const target = serve(createApp({ amm }));
  const post = poster(target);

  it('answers 500 INVARIANT_VIOLATION when custody fails mid-payout', async () => {
    const res = await post(`/pools/${poolId}/withdraw`, { sender: 'alice', shareAmount: '100' });

    expect(res.status).toBe(500);
    expect(await res.json()).toEqual({
      status: 'error',
      code: 'INVARIANT_VIOLATION',
      message: 'Internal invariant violated; the operation was aborted',
    });
    expect(amm.getPool(poolId)).toEqual([TOKEN_A, TOKEN_B, 1000n, 4000n, 30, 2000n]);
  });
});
