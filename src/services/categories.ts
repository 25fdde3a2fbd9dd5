import { InvalidCategoryError } from '../errors.js';

export const CLAIM_CATEGORIES = ['daily', 'weekly', 'monthly'] as const;

export type ClaimCategory = typeof CLAIM_CATEGORIES[number];

interface CategoryColumns {
  crystals: 'daily_crystals' | 'weekly_crystals' | 'monthly_crystals';
  claim: 'daily_claim' | 'weekly_claim' | 'monthly_claim';
}

// Only these literals ever reach SQL text
const CATEGORY_COLUMNS: Readonly<Record<ClaimCategory, CategoryColumns>> = {
  daily: { crystals: 'daily_crystals', claim: 'daily_claim' },
  weekly: { crystals: 'weekly_crystals', claim: 'weekly_claim' },
  monthly: { crystals: 'monthly_crystals', claim: 'monthly_claim' },
};

export function isClaimCategory(value: string): value is ClaimCategory {
  return CLAIM_CATEGORIES.some(category => category === value);
}

// Validate an untrusted category name (command argument, record key)
export function parseClaimCategory(value: string): ClaimCategory {
  if (!isClaimCategory(value)) {
    throw new InvalidCategoryError(value, CLAIM_CATEGORIES);
  }
  return value;
}

export function columnsFor(category: ClaimCategory): CategoryColumns {
  // Re-checked at runtime for plain JS callers that bypass the type
  return CATEGORY_COLUMNS[parseClaimCategory(category)];
}
