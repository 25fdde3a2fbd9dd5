import type { ClaimCategory } from './services/categories.js';

export class InvalidCategoryError extends Error {
  readonly code = 'INVALID_CATEGORY';
  readonly category: string;

  constructor(category: string, allowed: readonly ClaimCategory[]) {
    super(`Invalid claim category: ${category} (expected one of ${allowed.join(', ')})`);
    this.name = 'InvalidCategoryError';
    this.category = category;
  }
}

export class InvalidAmountError extends Error {
  readonly code = 'INVALID_AMOUNT';
  readonly amount: number;

  constructor(category: ClaimCategory, amount: number) {
    super(`Invalid ${category} crystal amount: ${amount}`);
    this.name = 'InvalidAmountError';
    this.amount = amount;
  }
}

export class StorageUnavailableError extends Error {
  readonly code = 'STORAGE_UNAVAILABLE';

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'StorageUnavailableError';
  }
}
