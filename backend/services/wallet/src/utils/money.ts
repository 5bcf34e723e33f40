export const TRANSFER_FEE_RATE = 0.01;
export const MIN_TRANSFER_FEE = 10;
export const MAX_TRANSFER_FEE = 100;

export const roundMoney = (value: number): number => Math.round(value * 100) / 100;

/**
 * 1% of the amount, clamped to [10, 100], in the sender's currency.
 */
export const computeTransferFee = (amount: number): number =>
  roundMoney(Math.min(Math.max(amount * TRANSFER_FEE_RATE, MIN_TRANSFER_FEE), MAX_TRANSFER_FEE));

export const isValidAmount = (amount: unknown): amount is number =>
  typeof amount === 'number' && Number.isFinite(amount) && amount > 0;

// Gateways take amounts in minor units (kobo, pesewas).
export const toMinorUnits = (amount: number): number => Math.round(amount * 100);

export const fromMinorUnits = (amount: number): number => roundMoney(amount / 100);

export const dayKey = (date: Date): string => date.toISOString().slice(0, 10);

export const monthKey = (date: Date): string => date.toISOString().slice(0, 7);
