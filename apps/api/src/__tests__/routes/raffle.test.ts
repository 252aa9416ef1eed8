/**
 * Raffle Routes Tests
 */

import { describe, it, expect, beforeEach } from 'vitest';
import { START, createTestApi, getJson, postJson, type TestApi } from '../helpers';

async function enterAll(api: TestApi): Promise<void> {
  await postJson(api, '/raffle/enter', 'alice', { fee: '100', charity: 'CHARITY1' });
  await postJson(api, '/raffle/enter', 'bob', { fee: '100', charity: 'CHARITY2' });
  await postJson(api, '/raffle/enter', 'carol', { fee: '100', charity: 'CHARITY2' });
}

describe('Raffle Routes', () => {
  let api: TestApi;

  beforeEach(() => {
    api = createTestApi();
  });

  describe('GET /raffle', () => {
    it('should return the summary with string amounts', async () => {
      const res = await getJson(api, '/raffle');

      expect(res.status).toBe(200);
      expect(await res.json()).toMatchObject({
        success: true,
        data: {
          state: 'open',
          entranceFee: '100',
          jackpot: '1000',
          balance: '1000',
          durationSeconds: 30,
          startedAt: new Date(START).toISOString(),
          entrantCount: 0,
          tallies: { CHARITY1: 0, CHARITY2: 0, CHARITY3: 0 },
          funder: 'funder',
          recentWinner: null,
          escrow: { highestDonationCount: 0, charityWinner: null, funded: false },
          pendingRequestId: null,
        },
      });
    });
  });

  describe('POST /raffle/enter', () => {
    it('should record the entry for the caller', async () => {
      const res = await postJson(api, '/raffle/enter', 'alice', {
        fee: '100',
        charity: 'CHARITY1',
      });

      expect(res.status).toBe(201);
      expect(await res.json()).toMatchObject({
        success: true,
        data: { entrant: 'alice', charity: 'CHARITY1', fee: '100' },
      });
      expect(api.engine.getEntrants()).toEqual(['alice']);
      expect(api.ledger.balanceOf('alice')).toBe(900n);
      expect(api.ledger.balanceOf('charity-a')).toBe(100n);
    });

    it('should reject anonymous entries', async () => {
      const res = await postJson(api, '/raffle/enter', null, { fee: '100', charity: 'CHARITY1' });

      expect(res.status).toBe(401);
      expect(await res.json()).toMatchObject({
        success: false,
        error: {
          key: 'SYSTEM_UNAUTHORIZED',
          details: { reason: 'Missing authorization header' },
        },
      });
      expect(api.engine.getEntrantCount()).toBe(0);
    });

    it('should map a low fee to 400', async () => {
      const res = await postJson(api, '/raffle/enter', 'alice', { fee: '50', charity: 'CHARITY1' });

      expect(res.status).toBe(400);
      expect(await res.json()).toMatchObject({
        error: { code: 1001, key: 'ENTRY_INSUFFICIENT_FEE' },
      });
      expect(api.ledger.balanceOf('alice')).toBe(1_000n);
    });

    it('should reject a malformed fee before the engine sees it', async () => {
      const res = await postJson(api, '/raffle/enter', 'alice', { fee: '1.5', charity: 'CHARITY1' });

      expect(res.status).toBe(400);
      expect(await res.json()).toMatchObject({
        error: {
          key: 'SYSTEM_VALIDATION_ERROR',
          details: { fields: { fee: 'must be a non-negative integer string' } },
        },
      });
    });

    it('should reject an unknown charity', async () => {
      const res = await postJson(api, '/raffle/enter', 'alice', { fee: '100', charity: 'CHARITY4' });

      expect(res.status).toBe(400);
      expect(await res.json()).toMatchObject({
        error: { key: 'SYSTEM_VALIDATION_ERROR', details: { fields: { charity: expect.any(String) } } },
      });
    });
  });

  describe('upkeep', () => {
    it('should report why the raffle cannot close yet', async () => {
      const res = await getJson(api, '/raffle/upkeep');

      expect(await res.json()).toMatchObject({
        data: {
          upkeepNeeded: false,
          isOpen: true,
          timePassed: false,
          hasPlayers: false,
          hasBalance: true,
        },
      });
    });

    it('should map an early upkeep to 409', async () => {
      const res = await postJson(api, '/raffle/upkeep', 'alice');

      expect(res.status).toBe(409);
      expect(await res.json()).toMatchObject({
        error: {
          key: 'LIFECYCLE_UPKEEP_NOT_NEEDED',
          details: { balance: '1000', entrantCount: 0, state: 'open' },
        },
      });
    });

    it('should close the raffle and request randomness', async () => {
      await enterAll(api);
      api.clock.now = START + 30_000;

      const check = await getJson(api, '/raffle/upkeep');
      expect(await check.json()).toMatchObject({ data: { upkeepNeeded: true } });

      const res = await postJson(api, '/raffle/upkeep', 'carol');

      expect(res.status).toBe(202);
      expect(await res.json()).toMatchObject({ success: true, data: { requestId: '1' } });
      expect(api.engine.getState()).toBe('calculating');
      expect(api.coordinator.pendingRequestIds()).toEqual([1n]);
    });
  });

  describe('full cycle', () => {
    it('should pay the winner and record the charity winner', async () => {
      await enterAll(api);
      api.clock.now = START + 30_000;
      await postJson(api, '/raffle/upkeep', 'carol');

      const blocked = await postJson(api, '/raffle/enter', 'alice', {
        fee: '100',
        charity: 'CHARITY3',
      });
      expect(blocked.status).toBe(409);
      expect(await blocked.json()).toMatchObject({ error: { key: 'ENTRY_RAFFLE_NOT_OPEN' } });

      // 4 mod 3 picks bob
      api.coordinator.fulfillRandomWords(1n, [4n, 0n, 0n, 0n]);

      const res = await getJson(api, '/raffle');
      expect(await res.json()).toMatchObject({
        data: {
          state: 'closed',
          balance: '0',
          entrantCount: 0,
          recentWinner: 'bob',
          escrow: { highestDonationCount: 2, charityWinner: 'charity-b', funded: false },
          pendingRequestId: null,
        },
      });
      expect(api.ledger.balanceOf('bob')).toBe(1_900n);

      const entrants = await getJson(api, '/raffle/entrants');
      expect(await entrants.json()).toMatchObject({ data: { entrants: [], count: 0 } });
    });
  });

  it('should answer unknown paths with 404', async () => {
    const res = await getJson(api, '/raffle/unknown');

    expect(res.status).toBe(404);
    expect(await res.json()).toMatchObject({ success: false, error: { code: 'NOT_FOUND' } });
  });

  it('should report health', async () => {
    const res = await getJson(api, '/health');

    expect(res.status).toBe(200);
    expect(await res.json()).toMatchObject({ status: 'ok', service: 'charity-raffle-api' });
  });
});
