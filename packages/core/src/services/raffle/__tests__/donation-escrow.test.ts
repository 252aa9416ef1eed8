import { describe, it, expect, beforeEach } from 'vitest';
import { DonationEscrow } from '../donation-escrow';
import { InMemoryValueLedger } from '../value-ledger';
import { catchRaffleError } from './fixtures';

describe('DonationEscrow', () => {
  let ledger: InMemoryValueLedger;
  let escrow: DonationEscrow;

  beforeEach(() => {
    ledger = new InMemoryValueLedger({ funder: 10_000n });
    escrow = new DonationEscrow({
      funder: 'funder',
      entranceFee: 100n,
      custodyAccount: 'raffle',
      transfer: ledger,
    });
    escrow.recordCharityWinner('charity-b', 3);
  });

  describe('access', () => {
    it('should reject callers other than the funder before checking state', () => {
      const error = catchRaffleError(() => escrow.fund('alice', 'open'));

      expect(error.errorCode).toBe('ESCROW_NOT_FUNDER');
      expect(error.details).toEqual({ caller: 'alice' });
    });

    it.each(['open', 'calculating'] as const)('should refuse to fund while %s', (state) => {
      const error = catchRaffleError(() => escrow.fund('funder', state));
      expect(error.errorCode).toBe('LIFECYCLE_RAFFLE_NOT_CLOSED');
    });

    it('should refuse to release while not closed', () => {
      const error = catchRaffleError(() => escrow.release('funder', 'open'));
      expect(error.errorCode).toBe('LIFECYCLE_RAFFLE_NOT_CLOSED');
    });
  });

  describe('fund', () => {
    it('should move highestDonationCount times the entrance fee into custody', () => {
      const amount = escrow.fund('funder', 'closed');

      expect(amount).toBe(300n);
      expect(ledger.balanceOf('funder')).toBe(9_700n);
      expect(ledger.balanceOf('raffle')).toBe(300n);
      expect(escrow.getStatus()).toEqual({
        highestDonationCount: 0,
        charityWinner: 'charity-b',
        funded: true,
      });
    });

    it('should roll back when the funder cannot pay', () => {
      ledger.transfer('funder', 'elsewhere', 9_900n);

      const error = catchRaffleError(() => escrow.fund('funder', 'closed'));

      expect(error.errorCode).toBe('ESCROW_FUNDING_TRANSFER_FAILED');
      expect(error.details).toEqual({
        amount: '300',
        reason: 'insufficient funds: funder holds 100, needs 300',
      });
      expect(escrow.getStatus()).toEqual({
        highestDonationCount: 3,
        charityWinner: 'charity-b',
        funded: false,
      });
    });
  });

  describe('release', () => {
    it('should require a funded match', () => {
      const error = catchRaffleError(() => escrow.release('funder', 'closed'));
      expect(error.errorCode).toBe('ESCROW_MATCH_NOT_FUNDED');
    });

    it('should pay the whole custody balance to the charity winner and clear the escrow', () => {
      ledger.deposit('raffle', 50n);
      escrow.fund('funder', 'closed');

      const release = escrow.release('funder', 'closed');

      expect(release).toEqual({ charity: 'charity-b', amount: 350n });
      expect(ledger.balanceOf('charity-b')).toBe(350n);
      expect(ledger.balanceOf('raffle')).toBe(0n);
      expect(escrow.getStatus()).toEqual({
        highestDonationCount: 0,
        charityWinner: null,
        funded: false,
      });
    });

    it('should refuse a second release', () => {
      escrow.fund('funder', 'closed');
      escrow.release('funder', 'closed');

      const error = catchRaffleError(() => escrow.release('funder', 'closed'));
      expect(error.errorCode).toBe('ESCROW_MATCH_NOT_FUNDED');
    });

    it('should keep the match funded when the charity rejects it', () => {
      escrow.fund('funder', 'closed');
      ledger.rejectTransfersTo('charity-b');

      const error = catchRaffleError(() => escrow.release('funder', 'closed'));

      expect(error.errorCode).toBe('ESCROW_DONATION_MATCH_FAILED');
      expect(error.details).toEqual({
        charityWinner: 'charity-b',
        amount: '300',
        reason: 'recipient charity-b rejects transfers',
      });
      expect(escrow.getStatus()).toEqual({
        highestDonationCount: 0,
        charityWinner: 'charity-b',
        funded: true,
      });
      expect(ledger.balanceOf('raffle')).toBe(300n);
    });

    it('should retry a failed release once the charity accepts', () => {
      escrow.fund('funder', 'closed');
      ledger.rejectTransfersTo('charity-b');
      catchRaffleError(() => escrow.release('funder', 'closed'));
      ledger.acceptTransfersTo('charity-b');

      expect(escrow.release('funder', 'closed')).toEqual({ charity: 'charity-b', amount: 300n });
    });
  });
});
