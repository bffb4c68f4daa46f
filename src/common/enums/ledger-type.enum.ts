/**
 * Ledger entry types for financial audit trail
 * All balance operations MUST create a ledger entry
 */
export enum LedgerType {
  DEPOSIT = 'DEPOSIT', // Funds deposited
  LOCK = 'LOCK', // Funds escrowed for a bid
  PAYOUT = 'PAYOUT', // Escrowed funds released to a seller (paired with PROCEEDS or DUST)
  PROCEEDS = 'PROCEEDS', // Seller credited for sold units
  DUST = 'DUST', // Seller credited with integer-division remainder of a bid deposit
  REFUND = 'REFUND', // Escrowed funds returned to the bidder
  WITHDRAWAL = 'WITHDRAWAL', // Funds paid out of the platform
}
