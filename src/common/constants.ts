/**
 * Owner value of an asset while the marketplace holds custody of it
 * Never a valid account ObjectId, so no account can act as the custodian
 */
export const MARKETPLACE_CUSTODY = 'marketplace';

/**
 * DI token for the outbound value-transfer backend
 */
export const PAYMENT_GATEWAY = Symbol('PAYMENT_GATEWAY');
