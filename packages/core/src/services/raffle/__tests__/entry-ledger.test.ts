import { describe, it, expect, beforeEach } from 'vitest';
import { EntryLedger } from '../entry-ledger';
import { InMemoryValueLedger } from '../value-ledger';
import { catchRaffleError } from './fixtures';

const charities = {
  CHARITY1: 'charity-a',
  CHARITY2: 'charity-b',
  CHARITY3: 'charity-c',
};

describe('EntryLedger', () => {
  let ledger: InMemoryValueLedger;
  let entries: EntryLedger;

  beforeEach(() => {
    ledger = new InMemoryValueLedger({ alice: 1_000n, bob: 1_000n, poor: 50n });
    entries = new EntryLedger({ entranceFee: 100n, charities, transfer: ledger });
  });

  describe('enter', () => {
    it('should route the fee to the chosen charity and record the entrant', () => {
      const entry = entries.enter({ fee: 100n, charity: 'CHARITY2', entrant: 'alice', state: 'open' });

      expect(entry).toEqual({ entrant: 'alice', charity: 'CHARITY2', fee: 100n });
      expect(ledger.balanceOf('alice')).toBe(900n);
      expect(ledger.balanceOf('charity-b')).toBe(100n);
      expect(entries.getTallies()).toEqual({ CHARITY1: 0, CHARITY2: 1, CHARITY3: 0 });
      expect(entries.getEntrants()).toEqual(['alice']);
    });

    it('should accept more than the entrance fee and forward all of it', () => {
      entries.enter({ fee: 250n, charity: 'CHARITY1', entrant: 'bob', state: 'open' });

      expect(ledger.balanceOf('charity-a')).toBe(250n);
      expect(ledger.balanceOf('bob')).toBe(750n);
    });

    it('should keep entrants in arrival order with duplicates', () => {
      entries.enter({ fee: 100n, charity: 'CHARITY1', entrant: 'alice', state: 'open' });
      entries.enter({ fee: 100n, charity: 'CHARITY3', entrant: 'bob', state: 'open' });
      entries.enter({ fee: 100n, charity: 'CHARITY1', entrant: 'alice', state: 'open' });

      expect(entries.getEntrants()).toEqual(['alice', 'bob', 'alice']);
      expect(entries.entrantCount).toBe(3);
      expect(entries.getTallies()).toEqual({ CHARITY1: 2, CHARITY2: 0, CHARITY3: 1 });
    });

    it('should reject a fee below the entrance fee', () => {
      const error = catchRaffleError(() =>
        entries.enter({ fee: 99n, charity: 'CHARITY1', entrant: 'alice', state: 'open' }),
      );

      expect(error.errorCode).toBe('ENTRY_INSUFFICIENT_FEE');
      expect(error.details).toEqual({ fee: '99', minimum: '100' });
      expect(entries.entrantCount).toBe(0);
    });

    it('should check the fee before the raffle state', () => {
      const error = catchRaffleError(() =>
        entries.enter({ fee: 1n, charity: 'CHARITY1', entrant: 'alice', state: 'closed' }),
      );
      expect(error.errorCode).toBe('ENTRY_INSUFFICIENT_FEE');
    });

    it.each(['calculating', 'closed'] as const)('should reject entries while %s', (state) => {
      const error = catchRaffleError(() =>
        entries.enter({ fee: 100n, charity: 'CHARITY1', entrant: 'alice', state }),
      );

      expect(error.errorCode).toBe('ENTRY_RAFFLE_NOT_OPEN');
      expect(error.details).toEqual({ state });
      expect(ledger.balanceOf('alice')).toBe(1_000n);
    });

    it('should reject an unknown charity before any other check', () => {
      const error = catchRaffleError(() =>
        entries.enter({ fee: 1n, charity: 'CHARITY4', entrant: 'alice', state: 'closed' }),
      );
      expect(error.errorCode).toBe('SYSTEM_VALIDATION_ERROR');
    });

    it('should record nothing when the charity rejects the transfer', () => {
      ledger.rejectTransfersTo('charity-c');

      const error = catchRaffleError(() =>
        entries.enter({ fee: 100n, charity: 'CHARITY3', entrant: 'alice', state: 'open' }),
      );

      expect(error.errorCode).toBe('ENTRY_CHARITY_TRANSFER_FAILED');
      expect(error.details).toEqual({
        charity: 'charity-c',
        reason: 'recipient charity-c rejects transfers',
      });
      expect(entries.getTallies()).toEqual({ CHARITY1: 0, CHARITY2: 0, CHARITY3: 0 });
      expect(entries.getEntrants()).toEqual([]);
      expect(ledger.balanceOf('alice')).toBe(1_000n);
    });

    it('should record nothing when the entrant cannot pay', () => {
      const error = catchRaffleError(() =>
        entries.enter({ fee: 100n, charity: 'CHARITY1', entrant: 'poor', state: 'open' }),
      );

      expect(error.errorCode).toBe('ENTRY_CHARITY_TRANSFER_FAILED');
      expect(entries.entrantCount).toBe(0);
    });
  });

  describe('drain', () => {
    it('should return the cycle and reset the ledger', () => {
      entries.enter({ fee: 100n, charity: 'CHARITY1', entrant: 'alice', state: 'open' });
      entries.enter({ fee: 100n, charity: 'CHARITY2', entrant: 'bob', state: 'open' });

      const drained = entries.drain();

      expect(drained).toEqual({
        entrants: ['alice', 'bob'],
        tallies: { CHARITY1: 1, CHARITY2: 1, CHARITY3: 0 },
      });
      expect(entries.getEntrants()).toEqual([]);
      expect(entries.getTallies()).toEqual({ CHARITY1: 0, CHARITY2: 0, CHARITY3: 0 });
    });

    it('should be undone by restore', () => {
      entries.enter({ fee: 100n, charity: 'CHARITY1', entrant: 'alice', state: 'open' });
      const snapshot = entries.snapshot();

      entries.drain();
      entries.restore(snapshot);

      expect(entries.getEntrants()).toEqual(['alice']);
      expect(entries.getTallies().CHARITY1).toBe(1);
    });
  });
});

describe('InMemoryValueLedger', () => {
  it('should move value between accounts', () => {
    const ledger = new InMemoryValueLedger({ alice: 10n });

    expect(ledger.transfer('alice', 'bob', 4n)).toEqual({ ok: true });
    expect(ledger.balanceOf('alice')).toBe(6n);
    expect(ledger.balanceOf('bob')).toBe(4n);
  });

  it('should refuse overdrafts and negative amounts', () => {
    const ledger = new InMemoryValueLedger({ alice: 10n });

    expect(ledger.transfer('alice', 'bob', 11n)).toEqual({
      ok: false,
      reason: 'insufficient funds: alice holds 10, needs 11',
    });
    expect(ledger.transfer('alice', 'bob', -1n)).toEqual({ ok: false, reason: 'negative amount' });
    expect(ledger.balanceOf('alice')).toBe(10n);
  });

  it('should honour rejecting recipients until they accept again', () => {
    const ledger = new InMemoryValueLedger({ alice: 10n });
    ledger.rejectTransfersTo('bob');

    expect(ledger.transfer('alice', 'bob', 1n).ok).toBe(false);

    ledger.acceptTransfersTo('bob');
    expect(ledger.transfer('alice', 'bob', 1n).ok).toBe(true);
  });

  it('should not mint negative deposits', () => {
    const ledger = new InMemoryValueLedger();
    expect(() => ledger.deposit('alice', -5n)).toThrow(RangeError);
  });
});
