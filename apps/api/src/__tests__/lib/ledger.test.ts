/**
 * Ledger Bootstrap Tests
 */

import { describe, it, expect } from 'vitest';
import { isRaffleError, parseRaffleConfig } from '@charity-raffle/core';
import { createSeededLedger, parseLedgerBalances } from '../../lib/ledger';

const config = parseRaffleConfig({
  entranceFee: 100n,
  jackpot: 1_000n,
  durationSeconds: 30,
  keepersUpdateIntervalSeconds: 30,
  keyHash: 'test-gas-lane',
  subscriptionId: '1',
  charities: { CHARITY1: 'charity-a', CHARITY2: 'charity-b', CHARITY3: 'charity-c' },
  funder: 'funder',
  raffleAccount: 'raffle',
});

describe('parseLedgerBalances', () => {
  it('should parse account=amount pairs', () => {
    expect(parseLedgerBalances('alice=1000, bob = 250')).toEqual({ alice: 1_000n, bob: 250n });
  });

  it('should sum repeated accounts', () => {
    expect(parseLedgerBalances('alice=10,alice=5')).toEqual({ alice: 15n });
  });

  it('should treat a missing value as no balances', () => {
    expect(parseLedgerBalances(undefined)).toEqual({});
    expect(parseLedgerBalances('')).toEqual({});
  });

  it('should reject a malformed entry', () => {
    let caught: unknown;
    try {
      parseLedgerBalances('alice=ten');
    } catch (error) {
      caught = error;
    }

    expect(isRaffleError(caught)).toBe(true);
    expect(caught).toMatchObject({
      errorCode: 'SYSTEM_VALIDATION_ERROR',
      details: {
        fields: { LEDGER_BALANCES: 'invalid entry "alice=ten": amount must be a non-negative integer' },
      },
    });
  });
});

describe('createSeededLedger', () => {
  it('should top the funder up to the jackpot', () => {
    const ledger = createSeededLedger(config, 'funder=10,alice=500');

    expect(ledger.balanceOf('funder')).toBe(1_000n);
    expect(ledger.balanceOf('alice')).toBe(500n);
  });

  it('should keep a larger funder balance', () => {
    expect(createSeededLedger(config, 'funder=5000').balanceOf('funder')).toBe(5_000n);
  });
});
