/**
 * Category catalog: the fixed option list per transaction type.
 * The first option of each list is the default selection.
 */
import type { TxType } from './types';

export const TX_TYPES = {
  INCOME: 'รายรับ',
  EXPENSE: 'รายจ่าย',
} as const satisfies Record<string, TxType>;

const CATEGORY_OPTIONS: Record<TxType, readonly string[]> = {
  [TX_TYPES.INCOME]: ['เงินรายวัน', 'รายได้อื่นๆ'],
  [TX_TYPES.EXPENSE]: ['ค่าอาหาร', 'ค่าเดินทาง', 'ค่าใช้จ่ายอื่นๆ'],
};

export function isTxType(value: string): value is TxType {
  return value === TX_TYPES.INCOME || value === TX_TYPES.EXPENSE;
}

export function categoryOptions(type: TxType): readonly string[] {
  return CATEGORY_OPTIONS[type];
}

export function defaultCategory(type: TxType): string {
  return CATEGORY_OPTIONS[type][0];
}

/** Whether `category` is offered for `type` in the current catalog */
export function isCategoryOf(type: TxType, category: string): boolean {
  return CATEGORY_OPTIONS[type].includes(category);
}

/** Every type in display order */
export function allTxTypes(): TxType[] {
  return [TX_TYPES.INCOME, TX_TYPES.EXPENSE];
}
