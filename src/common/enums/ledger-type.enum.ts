/**
 * Ledger entry types for the financial audit trail
 * Every wallet or credit mutation MUST create a ledger entry
 */
export enum LedgerType {
  DEPOSIT = 'DEPOSIT', // external deposit into the wallet
  ESCROW = 'ESCROW', // bid value taken from the wallet into marketplace escrow
  REFUND = 'REFUND', // displaced bid delivered straight back to the wallet
  CREDIT = 'CREDIT', // delivery failed, amount parked in the credit ledger
  WITHDRAWAL = 'WITHDRAWAL', // credit ledger balance paid out to its owner
  SALE_PROCEEDS = 'SALE_PROCEEDS', // winning amount delivered to the seller
}
