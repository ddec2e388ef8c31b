/** Account implementation version reported by `accountId()` */
export const ACCOUNT_VERSION = '0.4.0';

export const ACCOUNT_ID = `latchkey.modular-account.${ACCOUNT_VERSION}`;
